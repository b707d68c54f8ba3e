import { Effect, Layer, Option } from "effect";
import puppeteer, { type Browser } from "puppeteer-core";
import { ConfigService } from "../../lib/config.js";
import { BrowserUnavailableError, RenderError } from "../../lib/errors.js";
import { HtmlRenderer, type RenderSession } from "./html-renderer.js";

/**
 * Local headless Chromium driven through puppeteer-core. One browser process
 * per batch, one browser context per document.
 */
export const ChromiumRendererLive = Layer.effect(
  HtmlRenderer,
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const executablePath = Option.getOrUndefined(
      config.chromium.executablePath,
    );
    const format = config.pageFormat;

    const launch = Effect.tryPromise({
      try: () =>
        puppeteer.launch(
          executablePath
            ? { executablePath, headless: true }
            : { channel: "chrome", headless: true },
        ),
      catch: (error) =>
        new BrowserUnavailableError({
          message: `Failed to launch Chromium: ${error}`,
          renderer: "chromium",
          cause: error,
        }),
    });

    const shutdown = (browser: Browser) =>
      Effect.tryPromise(() => browser.close()).pipe(
        Effect.catchAll((error) =>
          Effect.logDebug(`Ignoring browser shutdown failure: ${error}`),
        ),
      );

    const makeSession = (browser: Browser): RenderSession => ({
      renderPdf: (html) =>
        Effect.acquireUseRelease(
          Effect.tryPromise({
            try: () => browser.createBrowserContext(),
            catch: (error) =>
              new RenderError({
                message: `Failed to open browser context: ${error}`,
                cause: error,
              }),
          }),
          (context) =>
            Effect.tryPromise({
              try: async () => {
                const page = await context.newPage();
                await page.setContent(html, { waitUntil: "load" });
                return page.pdf({ format, printBackground: true });
              },
              catch: (error) =>
                new RenderError({
                  message: `HTML rendering failed: ${error}`,
                  cause: error,
                }),
            }),
          (context) =>
            Effect.tryPromise(() => context.close()).pipe(
              Effect.catchAll((error) =>
                Effect.logDebug(
                  `Ignoring browser context close failure: ${error}`,
                ),
              ),
            ),
        ),
    });

    return HtmlRenderer.of({
      name: "chromium",
      open: Effect.acquireRelease(launch, shutdown).pipe(
        Effect.map(makeSession),
      ),
    });
  }),
);

import { Duration, Effect, Layer } from "effect";
import { ConfigService, type PageFormat } from "../../lib/config.js";
import { BrowserUnavailableError, RenderError } from "../../lib/errors.js";
import { HtmlRenderer, type RenderSession } from "./html-renderer.js";

// Paper sizes in inches, as Gotenberg expects them
const PAPER_SIZES: Record<PageFormat, { width: string; height: string }> = {
  A4: { width: "8.27", height: "11.7" },
  Letter: { width: "8.5", height: "11" },
  Legal: { width: "8.5", height: "14" },
};

const MARGIN_INCHES = "0.4";

/**
 * Remote Chromium behind a Gotenberg service. The session is stateless; each
 * render is one multipart request.
 */
export const GotenbergRendererLive = Layer.effect(
  HtmlRenderer,
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const gotenbergUrl = config.gotenberg.url.replace(/\/+$/, "");
    const paper = PAPER_SIZES[config.pageFormat];

    const session: RenderSession = {
      renderPdf: (html) =>
        Effect.gen(function* () {
          const formData = new FormData();
          formData.append(
            "files",
            new Blob([html], { type: "text/html" }),
            "index.html",
          );
          formData.append("paperWidth", paper.width);
          formData.append("paperHeight", paper.height);
          formData.append("marginTop", MARGIN_INCHES);
          formData.append("marginBottom", MARGIN_INCHES);
          formData.append("marginLeft", MARGIN_INCHES);
          formData.append("marginRight", MARGIN_INCHES);
          formData.append("printBackground", "true");

          const response = yield* Effect.tryPromise({
            try: async (signal) => {
              const res = await fetch(
                `${gotenbergUrl}/forms/chromium/convert/html`,
                {
                  method: "POST",
                  body: formData,
                  signal,
                },
              );

              if (!res.ok) {
                const errorText = await res.text();
                throw new Error(
                  `Gotenberg conversion failed (${res.status}): ${errorText}`,
                );
              }

              return res;
            },
            catch: (error) =>
              new RenderError({
                message: `Failed to convert with Gotenberg: ${error}`,
                cause: error,
              }),
          });

          return yield* Effect.tryPromise({
            try: async () => new Uint8Array(await response.arrayBuffer()),
            catch: (error) =>
              new RenderError({
                message: `Failed to read PDF response: ${error}`,
                cause: error,
              }),
          });
        }).pipe(
          Effect.timeoutFail({
            duration: config.gotenberg.timeout,
            onTimeout: () =>
              new RenderError({
                message: `Gotenberg conversion timed out after ${Duration.format(config.gotenberg.timeout)}`,
              }),
          }),
        ),
    };

    const healthCheck = Effect.tryPromise({
      try: async (signal) => {
        const res = await fetch(`${gotenbergUrl}/health`, { signal });
        if (!res.ok) {
          throw new Error(`health check returned ${res.status}`);
        }
      },
      catch: (error) =>
        new BrowserUnavailableError({
          message: `Gotenberg is not reachable at ${gotenbergUrl}: ${error}`,
          renderer: "gotenberg",
          cause: error,
        }),
    }).pipe(
      Effect.timeoutFail({
        duration: config.gotenberg.timeout,
        onTimeout: () =>
          new BrowserUnavailableError({
            message: `Gotenberg did not answer at ${gotenbergUrl}`,
            renderer: "gotenberg",
          }),
      }),
    );

    return HtmlRenderer.of({
      name: "gotenberg",
      open: healthCheck.pipe(Effect.as(session)),
    });
  }),
);

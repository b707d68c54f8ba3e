import { createServer, type Server } from "node:http";
import { describe, expect, it } from "@effect/vitest";
import { ConfigProvider, Effect, Layer } from "effect";
import { ConfigService } from "../../../src/lib/config.js";
import { GotenbergRendererLive } from "../../../src/services/pdf-renderer/gotenberg.js";
import { HtmlRenderer } from "../../../src/services/pdf-renderer/html-renderer.js";
import { HtmlRendererLive } from "../../../src/services/pdf-renderer/layers.js";

interface RecordedRequest {
  readonly url: string;
  readonly body: string;
}

interface StubOptions {
  readonly healthy: boolean;
  readonly hangOnConvert?: boolean;
}

/**
 * In-process stand-in for a Gotenberg instance
 */
const startGotenbergStub = ({ healthy, hangOnConvert = false }: StubOptions) =>
  Effect.acquireRelease(
    Effect.async<{ server: Server; url: string; requests: RecordedRequest[] }>(
      (resume) => {
        const requests: RecordedRequest[] = [];
        const server = createServer((req, res) => {
          const chunks: Buffer[] = [];
          req.on("data", (chunk: Buffer) => chunks.push(chunk));
          req.on("end", () => {
            requests.push({
              url: req.url ?? "",
              body: Buffer.concat(chunks).toString("utf8"),
            });
            if (req.url === "/health") {
              res.writeHead(healthy ? 200 : 503).end();
              return;
            }
            if (hangOnConvert) return;
            res
              .writeHead(200, { "Content-Type": "application/pdf" })
              .end("%PDF-from-gotenberg");
          });
        });
        server.listen(0, "127.0.0.1", () => {
          const address = server.address();
          const port =
            typeof address === "object" && address !== null ? address.port : 0;
          resume(
            Effect.succeed({ server, url: `http://127.0.0.1:${port}`, requests }),
          );
        });
      },
    ),
    ({ server }) =>
      Effect.async<void>((resume) => {
        server.closeAllConnections();
        server.close(() => resume(Effect.void));
      }),
  );

const withConfig = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe("HtmlRenderer Tests", () => {
  describe("GotenbergRendererLive", () => {
    it.scoped("should post the document as index.html", () =>
      Effect.gen(function* () {
        const stub = yield* startGotenbergStub({ healthy: true });

        const bytes = yield* Effect.gen(function* () {
          const renderer = yield* HtmlRenderer;
          const session = yield* renderer.open;
          return yield* session.renderPdf("<p>Hello</p>");
        }).pipe(
          Effect.provide(
            GotenbergRendererLive.pipe(Layer.provide(ConfigService.Default)),
          ),
          withConfig([
            ["GOTENBERG_URL", `${stub.url}/`],
            ["EMAIL_PDF_PAGE_FORMAT", "Letter"],
          ]),
        );

        expect(new TextDecoder().decode(bytes)).toBe("%PDF-from-gotenberg");

        const convert = stub.requests.find(
          (request) => request.url === "/forms/chromium/convert/html",
        );
        expect(convert?.body).toContain('filename="index.html"');
        expect(convert?.body).toContain("<p>Hello</p>");
        expect(convert?.body).toContain('name="paperWidth"\r\n\r\n8.5');
      }),
    );

    it.scoped("should refuse to open when the health check fails", () =>
      Effect.gen(function* () {
        const stub = yield* startGotenbergStub({ healthy: false });

        const error = yield* Effect.gen(function* () {
          const renderer = yield* HtmlRenderer;
          return yield* Effect.flip(renderer.open);
        }).pipe(
          Effect.provide(
            GotenbergRendererLive.pipe(Layer.provide(ConfigService.Default)),
          ),
          withConfig([["GOTENBERG_URL", stub.url]]),
        );

        expect(error._tag).toBe("BrowserUnavailableError");
        expect(error.renderer).toBe("gotenberg");
      }),
    );
  });

  describe("GotenbergRendererLive timeouts", () => {
    it.scopedLive("should fail the render when Gotenberg does not answer", () =>
      Effect.gen(function* () {
        const stub = yield* startGotenbergStub({
          healthy: true,
          hangOnConvert: true,
        });

        const error = yield* Effect.gen(function* () {
          const renderer = yield* HtmlRenderer;
          const session = yield* renderer.open;
          return yield* Effect.flip(session.renderPdf("<p>Hello</p>"));
        }).pipe(
          Effect.provide(
            GotenbergRendererLive.pipe(Layer.provide(ConfigService.Default)),
          ),
          withConfig([
            ["GOTENBERG_URL", stub.url],
            ["GOTENBERG_TIMEOUT", "200 millis"],
          ]),
        );

        expect(error._tag).toBe("RenderError");
        expect(error.message).toContain("timed out");
      }),
    );
  });

  describe("HtmlRendererLive", () => {
    it.scoped("should pick the renderer named in the configuration", () =>
      Effect.gen(function* () {
        const renderer = yield* HtmlRenderer;
        expect(renderer.name).toBe("none");

        const error = yield* Effect.flip(renderer.open);
        expect(error._tag).toBe("BrowserUnavailableError");
      }).pipe(
        Effect.provide(HtmlRendererLive),
        withConfig([["EMAIL_PDF_RENDERER", "none"]]),
      ),
    );
  });
});

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Option } from "effect";
import { RenderError, WriteError } from "../../lib/errors.js";
import type { RenderMode } from "../../lib/type.js";
import type { RenderSession } from "./html-renderer.js";
import {
  layoutTextPdf,
  PLACEHOLDER_TEXT,
  toAsciiReplaced,
  toPdfSafeText,
} from "./text-pdf.js";

export class PdfRendererService extends Effect.Service<PdfRendererService>()(
  "PdfRendererService",
  {
    effect: Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;

      const writeBytes = (outputPath: string, bytes: Uint8Array) =>
        fs.writeFile(outputPath, bytes).pipe(
          Effect.mapError(
            (error) =>
              new RenderError({
                message: `Failed to write ${outputPath}: ${error.message}`,
                cause: error,
              }),
          ),
        );

      const layoutAndWrite = (text: string, outputPath: string) =>
        layoutTextPdf(text).pipe(
          Effect.flatMap((bytes) => writeBytes(outputPath, bytes)),
        );

      /**
       * Text PDF with three levels of fallback: character substitution, blind
       * ASCII replacement, then a one-line placeholder document.
       */
      const writeText = (
        text: string,
        outputPath: string,
      ): Effect.Effect<RenderMode, WriteError> =>
        Effect.try({
          try: () => toPdfSafeText(text),
          catch: (error) =>
            new RenderError({
              message: `Character substitution failed: ${error}`,
              cause: error,
            }),
        }).pipe(
          Effect.flatMap((safeText) => layoutAndWrite(safeText, outputPath)),
          Effect.catchAll((error) =>
            Effect.logWarning(
              `Retrying ${outputPath} with ASCII replacement: ${error.message}`,
            ).pipe(
              Effect.zipRight(
                Effect.try({
                  try: () => toAsciiReplaced(text),
                  catch: (cause) =>
                    new RenderError({
                      message: `ASCII replacement failed: ${cause}`,
                      cause,
                    }),
                }),
              ),
              Effect.flatMap((asciiText) =>
                layoutAndWrite(asciiText, outputPath),
              ),
            ),
          ),
          Effect.catchAll((error) =>
            Effect.logWarning(
              `Writing placeholder PDF for ${outputPath}: ${error.message}`,
            ).pipe(
              Effect.zipRight(layoutAndWrite(PLACEHOLDER_TEXT, outputPath)),
            ),
          ),
          Effect.mapError(
            (error) =>
              new WriteError({
                message: `Failed to create PDF: ${error.message}`,
                path: outputPath,
                cause: error,
              }),
          ),
          Effect.as<RenderMode>("text"),
        );

      /**
       * Render a styled HTML document through the session when there is one,
       * otherwise (or on any render failure) lay out `fallbackText` instead.
       */
      const writeHtml = (
        session: Option.Option<RenderSession>,
        html: string,
        fallbackText: string,
        outputPath: string,
      ): Effect.Effect<RenderMode, WriteError> =>
        Option.match(session, {
          onNone: () =>
            writeText(fallbackText, outputPath).pipe(
              Effect.as<RenderMode>("degraded"),
            ),
          onSome: (active) =>
            active.renderPdf(html).pipe(
              Effect.flatMap((bytes) => writeBytes(outputPath, bytes)),
              Effect.as<RenderMode>("html"),
              Effect.catchAll((error) =>
                Effect.logWarning(
                  `Falling back to text PDF for ${outputPath}: ${error.message}`,
                ).pipe(
                  Effect.zipRight(writeText(fallbackText, outputPath)),
                  Effect.as<RenderMode>("degraded"),
                ),
              ),
            ),
        });

      return { writeText, writeHtml } as const;
    }),
    dependencies: [NodeContext.layer],
  },
) {}

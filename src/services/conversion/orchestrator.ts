import { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Option, Ref } from "effect";
import { ConfigService } from "../../lib/config.js";
import {
  type FileConversionError,
  MissingDateError,
  OutputDirectoryError,
  WriteError,
} from "../../lib/errors.js";
import {
  type ConversionReport,
  type ConversionResult,
  type EmailSource,
  emptyConversionResult,
  type RenderMode,
} from "../../lib/type.js";
import {
  extractFilenamePrefix,
  formatDateStamp,
  sourceFromPath,
} from "../../lib/util.js";
import {
  buildEmailDocument,
  buildTextDocument,
} from "../content-renderer/document.js";
import { ProgressLoggerService } from "../lib/progress.js";
import { MessageParserService } from "../message-parser/index.js";
import { PdfRendererService } from "../pdf-renderer/index.js";
import {
  HtmlRenderer,
  type RenderSession,
} from "../pdf-renderer/html-renderer.js";
import { makePdfNameAllocator, type PdfNameAllocator } from "./file-naming.js";

// ============================================================================
// Types
// ============================================================================

interface BatchContext {
  readonly outputDirectory: string;
  readonly session: Option.Option<RenderSession>;
  readonly names: PdfNameAllocator;
  readonly results: Ref.Ref<ConversionResult>;
}

interface FileOutcome {
  readonly outputName: string;
  readonly mode: RenderMode;
}

const describeFailure = (cause: Cause.Cause<FileConversionError>): string =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => Cause.pretty(cause),
    onSome: (error) => error.message,
  });

// ============================================================================
// Service
// ============================================================================

export class ConversionOrchestratorService extends Effect.Service<ConversionOrchestratorService>()(
  "ConversionOrchestratorService",
  {
    effect: Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const config = yield* ConfigService;
      const parser = yield* MessageParserService;
      const pdfRenderer = yield* PdfRendererService;
      const renderer = yield* HtmlRenderer;
      const progress = yield* ProgressLoggerService;

      const isDirectory = (target: string) =>
        fs.stat(target).pipe(
          Effect.map((info) => info.type === "Directory"),
          Effect.orElseSucceed(() => false),
        );

      const isFile = (target: string) =>
        fs.stat(target).pipe(
          Effect.map((info) => info.type === "File"),
          Effect.orElseSucceed(() => false),
        );

      /**
       * Top-level .eml/.msg files of a directory, sorted by name
       */
      const listSources = (directory: string) =>
        Effect.gen(function* () {
          const entries = yield* fs.readDirectory(directory).pipe(
            Effect.catchAll((error) =>
              Effect.logError(
                `Failed to list ${directory}: ${error.message}`,
              ).pipe(Effect.as<string[]>([])),
            ),
          );

          const candidates = [...entries]
            .sort()
            .flatMap((entry) =>
              Option.toArray(sourceFromPath(path.join(directory, entry))),
            );

          return yield* Effect.filter(candidates, (source) =>
            isFile(source.path),
          );
        });

      /**
       * Parse -> name -> render -> write for one file
       */
      const convertFile = (
        source: EmailSource,
        batch: BatchContext,
      ): Effect.Effect<FileOutcome, FileConversionError> =>
        Effect.gen(function* () {
          const fileName = path.basename(source.path);
          const prefix = extractFilenamePrefix(
            path.basename(source.path, path.extname(source.path)),
          );

          yield* progress.logItem(`📄 Processing: ${fileName}`);

          const message = yield* parser.parse(source);

          const date = yield* Option.match(message.dateParsed, {
            onNone: () =>
              Effect.fail(
                new MissingDateError({
                  message: `No valid date found in: ${fileName}`,
                  path: source.path,
                  dateRaw: message.dateRaw,
                }),
              ),
            onSome: (parsed) => Effect.succeed(parsed),
          });

          const outputName = yield* batch.names
            .claim(formatDateStamp(date), prefix)
            .pipe(
              Effect.mapError(
                (error) =>
                  new WriteError({
                    message: `Failed to check output names: ${error.message}`,
                    path: batch.outputDirectory,
                    cause: error,
                  }),
              ),
            );
          const outputPath = path.join(batch.outputDirectory, outputName);
          const textDocument = buildTextDocument(message);

          const mode = yield* Option.match(message.bodyHtml, {
            onNone: () => pdfRenderer.writeText(textDocument, outputPath),
            onSome: (bodyHtml) =>
              pdfRenderer.writeHtml(
                batch.session,
                buildEmailDocument({
                  subject: message.subject,
                  sender: message.sender,
                  recipient: message.recipient,
                  date: message.dateRaw,
                  bodyHtml,
                }),
                textDocument,
                outputPath,
              ),
          });

          return { outputName, mode };
        });

      /**
       * Task boundary: every outcome, success or failure, lands in the
       * shared result; nothing escapes to the batch.
       */
      const processFile = (source: EmailSource, batch: BatchContext) =>
        Effect.gen(function* () {
          const fileName = path.basename(source.path);
          const outcome = yield* Effect.exit(convertFile(source, batch));

          if (Exit.isSuccess(outcome)) {
            const { outputName, mode } = outcome.value;
            yield* Ref.update(batch.results, (result) => ({
              ...result,
              converted: [...result.converted, outputName],
              degraded:
                mode === "degraded"
                  ? [...result.degraded, outputName]
                  : result.degraded,
            }));
            yield* progress.logItem(`✅ Converted to: ${outputName}`);
            return;
          }

          const reason = describeFailure(outcome.cause);
          yield* Ref.update(batch.results, (result) => ({
            ...result,
            failed: [...result.failed, fileName],
            errors: [...result.errors, `${fileName}: ${reason}`],
          }));
          yield* Effect.logWarning(`Failed to convert ${fileName}: ${reason}`);
        });

      /**
       * Start the shared render session; without one every file takes the
       * text PDF path and a single warning is logged.
       */
      const openSession = Effect.gen(function* () {
        yield* progress.logItem(`🚀 Starting ${renderer.name} renderer...`);
        const session = yield* renderer.open.pipe(
          Effect.map(Option.some),
          Effect.catchTag("BrowserUnavailableError", (error) =>
            Effect.logWarning(
              `${error.message}. Falling back to text-based PDFs for this batch.`,
            ).pipe(Effect.as(Option.none<RenderSession>())),
          ),
        );

        if (Option.isSome(session)) {
          yield* Effect.addFinalizer(() =>
            progress.logItem("🧹 Cleaning up renderer resources..."),
          );
        }

        return session;
      });

      /**
       * Convert every .eml/.msg file of `inputDirectory` into
       * `<inputDirectory>/<output dir>/`. Fails only when the output directory
       * cannot be created.
       */
      const run = (
        inputDirectory: string,
      ): Effect.Effect<ConversionReport, OutputDirectoryError> =>
        Effect.gen(function* () {
          const inputDir = path.resolve(inputDirectory);
          const outputDir = path.join(inputDir, config.outputDirName);

          if (!(yield* isDirectory(inputDir))) {
            yield* Effect.logError(
              `The input directory '${inputDir}' does not exist.`,
            );
            return {
              ...emptyConversionResult,
              inputDirectory: inputDir,
              outputDirectory: outputDir,
              browserAvailable: false,
            };
          }

          yield* fs.makeDirectory(outputDir, { recursive: true }).pipe(
            Effect.mapError(
              (error) =>
                new OutputDirectoryError({
                  message: `Failed to create output directory: ${error.message}`,
                  path: outputDir,
                  cause: error,
                }),
            ),
          );
          yield* progress.logItem(`📁 Output directory: ${outputDir}`);

          return yield* Effect.scoped(
            Effect.gen(function* () {
              const session = yield* openSession;
              const results = yield* Ref.make(emptyConversionResult);
              const report = (result: ConversionResult): ConversionReport => ({
                ...result,
                inputDirectory: inputDir,
                outputDirectory: outputDir,
                browserAvailable: Option.isSome(session),
              });

              const sources = yield* listSources(inputDir);
              if (sources.length === 0) {
                yield* progress.logItem(
                  `⚠️ No .eml or .msg files found in ${inputDir}`,
                );
                return report(emptyConversionResult);
              }

              yield* progress.startTask("Converting emails", sources.length);

              const gate = yield* Effect.makeSemaphore(config.concurrency);
              const batch: BatchContext = {
                outputDirectory: outputDir,
                session,
                names: yield* makePdfNameAllocator(outputDir).pipe(
                  Effect.provideService(FileSystem.FileSystem, fs),
                  Effect.provideService(Path.Path, path),
                ),
                results,
              };

              yield* Effect.forEach(
                sources,
                (source) => gate.withPermits(1)(processFile(source, batch)),
                { concurrency: "unbounded", discard: true },
              );

              yield* progress.complete();
              return report(yield* Ref.get(results));
            }),
          );
        });

      return { run } as const;
    }),
    dependencies: [
      ConfigService.Default,
      MessageParserService.Default,
      PdfRendererService.Default,
      ProgressLoggerService.Default,
      NodeContext.layer,
    ],
  },
) {}

import { Args, Command, Options } from "@effect/cli";
import { ConfigProvider, Effect, Layer, Option } from "effect";
import { RENDERER_KINDS, type RendererKind } from "./lib/config.js";
import { ConversionOrchestratorService } from "./services/conversion/orchestrator.js";
import { ProgressLoggerService } from "./services/lib/progress.js";
import { HtmlRendererLive } from "./services/pdf-renderer/layers.js";

export { ConfigService } from "./lib/config.js";
export * from "./lib/errors.js";
export * from "./lib/type.js";
export {
  buildPdfFileName,
  extractFilenamePrefix,
  formatDateStamp,
} from "./lib/util.js";
export {
  buildEmailDocument,
  buildTextDocument,
} from "./services/content-renderer/document.js";
export { renderHtmlAsText } from "./services/content-renderer/html-to-text.js";
export { resolvePdfFileName } from "./services/conversion/file-naming.js";
export { ConversionOrchestratorService } from "./services/conversion/orchestrator.js";
export { formatSummary } from "./services/lib/progress.js";
export {
  MessageParserService,
  parseEmailDate,
} from "./services/message-parser/index.js";
export {
  HtmlRenderer,
  NoHtmlRendererLive,
  type RenderSession,
} from "./services/pdf-renderer/html-renderer.js";
export { PdfRendererService } from "./services/pdf-renderer/index.js";
export { HtmlRendererLive } from "./services/pdf-renderer/layers.js";

// CLI flags take precedence over the environment
const makeConfigProvider = (options: {
  concurrency: Option.Option<number>;
  renderer: Option.Option<RendererKind>;
}) => {
  const overrides = new Map<string, string>();
  if (Option.isSome(options.concurrency)) {
    overrides.set("EMAIL_PDF_CONCURRENCY", options.concurrency.value.toString());
  }
  if (Option.isSome(options.renderer)) {
    overrides.set("EMAIL_PDF_RENDERER", options.renderer.value);
  }

  return ConfigProvider.fromMap(overrides).pipe(
    ConfigProvider.orElse(() => ConfigProvider.fromEnv()),
  );
};

const convertLayer = Layer.mergeAll(
  ConversionOrchestratorService.Default,
  ProgressLoggerService.Default,
).pipe(Layer.provide(HtmlRendererLive));

// ============================================================================
// Convert Command
// ============================================================================

const directoryArg = Args.directory({ name: "directory" }).pipe(
  Args.withDescription("Directory containing .eml and .msg files"),
);

const concurrencyOption = Options.integer("concurrency").pipe(
  Options.withAlias("c"),
  Options.withDescription("Maximum number of files converted at once"),
  Options.optional,
);

const rendererOption = Options.choice("renderer", RENDERER_KINDS).pipe(
  Options.withDescription("HTML renderer used for emails with an HTML body"),
  Options.optional,
);

const runConvert = (directory: string) =>
  Effect.gen(function* () {
    const orchestrator = yield* ConversionOrchestratorService;
    const progress = yield* ProgressLoggerService;

    const report = yield* orchestrator.run(directory);

    yield* progress.summary(report);
    if (report.errors.length > 0) {
      yield* Effect.logDebug(`Failures:\n${report.errors.join("\n")}`);
    }
  });

const convertCommand = Command.make(
  "convert",
  {
    directory: directoryArg,
    concurrency: concurrencyOption,
    renderer: rendererOption,
  },
  ({ directory, concurrency, renderer }) =>
    runConvert(directory).pipe(
      Effect.provide(convertLayer),
      Effect.withConfigProvider(makeConfigProvider({ concurrency, renderer })),
    ),
).pipe(
  Command.withDescription(
    "Convert every .eml/.msg file in a directory to PDF under <directory>/PDFs",
  ),
);

// Root command that groups subcommands
const rootCommand = Command.make("email-pdf").pipe(
  Command.withSubcommands([convertCommand]),
  Command.withDescription("Email to PDF converter"),
);

export const cli = Command.run(rootCommand, {
  name: "Email to PDF Converter",
  version: "1.0.0",
});

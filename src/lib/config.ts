import { Config, Duration, Effect } from "effect";

export const RENDERER_KINDS = ["chromium", "gotenberg", "none"] as const;
export type RendererKind = (typeof RENDERER_KINDS)[number];

export const PAGE_FORMATS = ["A4", "Letter", "Legal"] as const;
export type PageFormat = (typeof PAGE_FORMATS)[number];

export class ConfigService extends Effect.Service<ConfigService>()(
  "ConfigService",
  {
    effect: Effect.gen(function* () {
      const concurrency = yield* Config.integer("EMAIL_PDF_CONCURRENCY").pipe(
        Config.validate({
          message: "EMAIL_PDF_CONCURRENCY must be at least 1",
          validation: (n) => n >= 1,
        }),
        Config.withDefault(50),
      );

      const renderer = yield* Config.literal(...RENDERER_KINDS)(
        "EMAIL_PDF_RENDERER",
      ).pipe(Config.withDefault("chromium"));

      const pageFormat = yield* Config.literal(...PAGE_FORMATS)(
        "EMAIL_PDF_PAGE_FORMAT",
      ).pipe(Config.withDefault("A4"));

      const outputDirName = yield* Config.string("EMAIL_PDF_OUTPUT_DIR").pipe(
        Config.withDefault("PDFs"),
      );

      const chromeExecutablePath = yield* Config.option(
        Config.string("CHROME_EXECUTABLE_PATH"),
      );

      const gotenbergUrl = yield* Config.string("GOTENBERG_URL").pipe(
        Config.withDefault("http://localhost:3001"),
      );

      const gotenbergTimeout = yield* Config.duration("GOTENBERG_TIMEOUT").pipe(
        Config.withDefault(Duration.seconds(60)),
      );

      const config = {
        concurrency,
        renderer,
        pageFormat,
        outputDirName,
        chromium: {
          executablePath: chromeExecutablePath,
        },
        gotenberg: {
          url: gotenbergUrl,
          timeout: gotenbergTimeout,
        },
      };

      return config;
    }),
  },
) {}

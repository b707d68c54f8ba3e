import { Effect } from "effect";
import type { ConversionResult } from "../../lib/type.js";

/**
 * Summary lines for a finished batch
 */
export const formatSummary = (result: ConversionResult): string[] => {
  const lines = [
    "📊 Summary:",
    `Converted: ${result.converted.length} files`,
    ...result.converted.map((name) => `  ➤ ${name}`),
  ];

  if (result.degraded.length > 0) {
    lines.push(
      `Rendered as plain text after HTML rendering failed: ${result.degraded.length} files`,
    );
  }

  if (result.failed.length > 0) {
    lines.push(
      "",
      `⚠️ Failed to convert ${result.failed.length} files:`,
      ...result.failed.map((name) => `  ✗ ${name}`),
    );
  }

  return lines;
};

export class ProgressLoggerService extends Effect.Service<ProgressLoggerService>()(
  "ProgressLoggerService",
  {
    effect: Effect.gen(function* () {
      const startTask = (taskName: string, total: number) =>
        Effect.sync(() => {
          console.log(`\n🚀 ${taskName} (${total} items)`);
        });

      const logItem = (message: string) =>
        Effect.sync(() => {
          console.log(`    → ${message}`);
        });

      const summary = (result: ConversionResult) =>
        Effect.sync(() => {
          console.log(`\n${formatSummary(result).join("\n")}`);
        });

      const complete = () =>
        Effect.sync(() => {
          console.log("✅ Complete\n");
        });

      return {
        startTask,
        logItem,
        summary,
        complete,
      } as const;
    }),
  },
) {}

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { ParseError } from "../../lib/errors.js";
import type { EmailSource, NormalizedMessage } from "../../lib/type.js";
import { parseEml } from "./eml.js";
import { parseMsg } from "./msg.js";

export { parseEmailDate } from "./date.js";

export class MessageParserService extends Effect.Service<MessageParserService>()(
  "MessageParserService",
  {
    effect: Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;

      const readSource = (source: EmailSource) =>
        fs.readFile(source.path).pipe(
          Effect.mapError(
            (error) =>
              new ParseError({
                message: `Failed to read ${source.path}: ${error.message}`,
                path: source.path,
                cause: error,
              }),
          ),
        );

      /**
       * Read and normalize one email file, dispatching on its format
       */
      const parse = (
        source: EmailSource,
      ): Effect.Effect<NormalizedMessage, ParseError> =>
        Effect.gen(function* () {
          const content = yield* readSource(source);

          switch (source._tag) {
            case "EmlSource":
              return yield* parseEml(content, source.path);
            case "MsgSource":
              return yield* parseMsg(content, source.path);
          }
        });

      return { parse } as const;
    }),
    dependencies: [NodeContext.layer],
  },
) {}

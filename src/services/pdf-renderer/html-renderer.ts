import { Context, Effect, Layer, type Scope } from "effect";
import {
  BrowserUnavailableError,
  type RenderError,
} from "../../lib/errors.js";

/**
 * An open handle on an HTML-capable renderer. Each call renders one document
 * in its own isolated context.
 */
export interface RenderSession {
  readonly renderPdf: (html: string) => Effect.Effect<Uint8Array, RenderError>;
}

/**
 * Headless rendering capability. `open` starts the shared session for a
 * batch; closing the surrounding scope stops it.
 */
export class HtmlRenderer extends Context.Tag("HtmlRenderer")<
  HtmlRenderer,
  {
    readonly name: string;
    readonly open: Effect.Effect<
      RenderSession,
      BrowserUnavailableError,
      Scope.Scope
    >;
  }
>() {}

/**
 * Renderer that never starts, forcing every file onto the text PDF path
 */
export const NoHtmlRendererLive = Layer.succeed(
  HtmlRenderer,
  HtmlRenderer.of({
    name: "none",
    open: Effect.fail(
      new BrowserUnavailableError({
        message: "HTML rendering is disabled",
        renderer: "none",
      }),
    ),
  }),
);

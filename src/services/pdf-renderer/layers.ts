import { Effect, Layer } from "effect";
import { ConfigService } from "../../lib/config.js";
import { ChromiumRendererLive } from "./chromium.js";
import { GotenbergRendererLive } from "./gotenberg.js";
import { NoHtmlRendererLive } from "./html-renderer.js";

/**
 * HtmlRenderer selected by EMAIL_PDF_RENDERER
 */
export const HtmlRendererLive = Layer.unwrapEffect(
  Effect.map(ConfigService, (config) => {
    switch (config.renderer) {
      case "chromium":
        return ChromiumRendererLive;
      case "gotenberg":
        return GotenbergRendererLive;
      case "none":
        return NoHtmlRendererLive;
    }
  }),
).pipe(Layer.provide(ConfigService.Default));

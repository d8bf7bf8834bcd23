/**
 * Template rendering.
 *
 * ```typescript
 * const engine = new TemplateEngine({ fragments: pack.fragments });
 * engine.render("Hello {{name}}. {{fragment:guidelines}}", { name: "Ada" });
 * ```
 */

export {
  TemplateEngine,
  TemplateError,
  FragmentCycleError,
  FragmentDepthError,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SYNTAX,
  type TemplateEngineOptions,
  type RenderOptions,
  type TemplateVariables,
} from "./engine.js";

export { formatValue } from "./format.js";

export { FragmentResolver, type FragmentResolverOptions } from "./fragments.js";

/**
 * Fragment resolution bound to a pack.
 *
 * Wraps a TemplateEngine built from the pack's fragment table and template
 * engine settings, and adds the checks a pack author needs before rendering.
 */

import type { PromptPack } from "../pack/schema.js";
import { TemplateEngine, type RenderOptions, type TemplateVariables } from "./engine.js";

export interface FragmentResolverOptions {
  maxDepth?: number;
}

export class FragmentResolver {
  readonly engine: TemplateEngine;

  constructor(pack: PromptPack, options: FragmentResolverOptions = {}) {
    this.engine = new TemplateEngine({
      syntax: pack.template_engine.syntax,
      fragments: pack.fragments ?? {},
      maxDepth: options.maxDepth,
    });
  }

  /**
   * Resolve every fragment and variable in a template.
   */
  resolveTemplate(
    template: string,
    variables: TemplateVariables,
    options: RenderOptions = {}
  ): string {
    return this.engine.render(template, variables, options);
  }

  /** Fragment names referenced directly by the template. */
  getRequiredFragments(template: string): Set<string> {
    return this.engine.extractFragments(template);
  }

  /**
   * Fragment names the template references that the pack does not define,
   * sorted. Empty when everything resolves.
   */
  validateFragments(template: string): string[] {
    return [...this.getRequiredFragments(template)]
      .filter((name) => !this.engine.hasFragment(name))
      .sort();
  }
}

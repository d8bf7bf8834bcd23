/**
 * Template engine.
 *
 * TEMPLATE FORMAT:
 *
 *   {{name}}              variable substitution
 *   {{fragment:name}}     splice in the named fragment, itself rendered
 *                         against the same variables
 *
 * Rules:
 *   - Names are identifiers: [a-zA-Z_][a-zA-Z0-9_]*
 *   - No whitespace inside braces; `{{ name }}` is plain text
 *   - One left-to-right pass; substituted text is never rescanned
 *   - `{{other:name}}` (any prefix but "fragment") is looked up as the
 *     variable "other:name"
 *   - strict (default): undefined variables/fragments throw TemplateError
 *   - non-strict: undefined tokens are left verbatim
 *   - A fragment that reaches itself again throws FragmentCycleError in
 *     either mode; nesting past `maxDepth` throws FragmentDepthError
 *
 * An engine holds only its frozen fragment table and settings, so one
 * instance can render any number of templates.
 */

import type { JsonValue } from "../pack/json.js";
import { formatValue } from "./format.js";

/** Matches `{{name}}` and `{{prefix:name}}`; group 1 is the whole key. */
const TOKEN_RE = /\{\{([a-zA-Z_][a-zA-Z0-9_]*(?::[a-zA-Z_][a-zA-Z0-9_]*)?)\}\}/g;

const FRAGMENT_PREFIX = "fragment";

export const DEFAULT_SYNTAX = "{{variable}}";
export const DEFAULT_MAX_DEPTH = 32;

export type TemplateVariables = Readonly<Record<string, JsonValue>>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

export class FragmentCycleError extends TemplateError {
  /** Fragment names along the cycle, first and last equal. */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Fragment cycle detected: ${cycle.join(" -> ")}`);
    this.name = "FragmentCycleError";
    this.cycle = cycle;
  }
}

export class FragmentDepthError extends TemplateError {
  constructor(
    public readonly fragmentName: string,
    public readonly maxDepth: number
  ) {
    super(`Fragment nesting exceeds maximum depth of ${maxDepth} at: ${fragmentName}`);
    this.name = "FragmentDepthError";
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface TemplateEngineOptions {
  /** Declared syntax; only `{{variable}}` is understood. */
  syntax?: string;
  fragments?: Readonly<Record<string, string>>;
  maxDepth?: number;
}

export interface RenderOptions {
  /** Throw on undefined variables/fragments (default: true). */
  strict?: boolean;
}

type TokenKey =
  | { kind: "fragment"; name: string }
  | { kind: "variable"; name: string };

function classifyKey(key: string): TokenKey {
  const separator = key.indexOf(":");
  if (separator !== -1 && key.slice(0, separator) === FRAGMENT_PREFIX) {
    return { kind: "fragment", name: key.slice(separator + 1) };
  }
  return { kind: "variable", name: key };
}

function* scanKeys(template: string): Generator<string> {
  for (const match of template.matchAll(TOKEN_RE)) {
    const key = match[1];
    if (key !== undefined) yield key;
  }
}

export class TemplateEngine {
  readonly syntax: string;
  readonly maxDepth: number;
  private readonly fragments: Readonly<Record<string, string>>;

  constructor(options: TemplateEngineOptions = {}) {
    this.syntax = options.syntax ?? DEFAULT_SYNTAX;
    this.fragments = Object.freeze({ ...(options.fragments ?? {}) });
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  hasFragment(name: string): boolean {
    return Object.hasOwn(this.fragments, name);
  }

  /**
   * Render a template against a variable mapping.
   *
   * @throws TemplateError       strict mode, undefined variable or fragment
   * @throws FragmentCycleError  a fragment (transitively) includes itself
   * @throws FragmentDepthError  fragment nesting deeper than maxDepth
   */
  render(template: string, variables: TemplateVariables, options: RenderOptions = {}): string {
    const { strict = true } = options;
    return this.renderWithin(template, variables, strict, []);
  }

  private renderWithin(
    template: string,
    variables: TemplateVariables,
    strict: boolean,
    activeFragments: readonly string[]
  ): string {
    return template.replace(TOKEN_RE, (token: string, key: string) => {
      const parsed = classifyKey(key);

      if (parsed.kind === "fragment") {
        return this.resolveFragment(parsed.name, token, variables, strict, activeFragments);
      }

      if (Object.hasOwn(variables, parsed.name)) {
        const value = variables[parsed.name];
        return formatValue(value === undefined ? null : value);
      }
      if (strict) {
        throw new TemplateError(`Undefined variable: ${parsed.name}`);
      }
      return token;
    });
  }

  private resolveFragment(
    name: string,
    token: string,
    variables: TemplateVariables,
    strict: boolean,
    activeFragments: readonly string[]
  ): string {
    if (!this.hasFragment(name)) {
      if (strict) {
        throw new TemplateError(`Undefined fragment: ${name}`);
      }
      return token;
    }

    if (activeFragments.includes(name)) {
      const start = activeFragments.indexOf(name);
      throw new FragmentCycleError([...activeFragments.slice(start), name]);
    }
    if (activeFragments.length >= this.maxDepth) {
      throw new FragmentDepthError(name, this.maxDepth);
    }

    const body = this.fragments[name] ?? "";
    return this.renderWithin(body, variables, strict, [...activeFragments, name]);
  }

  /**
   * Plain variable names referenced by a template (fragment bodies are not
   * inspected; prefixed keys are skipped).
   */
  extractVariables(template: string): Set<string> {
    const names = new Set<string>();
    for (const key of scanKeys(template)) {
      if (!key.includes(":")) names.add(key);
    }
    return names;
  }

  /**
   * Fragment names referenced directly by a template.
   */
  extractFragments(template: string): Set<string> {
    const names = new Set<string>();
    for (const key of scanKeys(template)) {
      const parsed = classifyKey(key);
      if (parsed.kind === "fragment") names.add(parsed.name);
    }
    return names;
  }
}

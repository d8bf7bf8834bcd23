/**
 * Cross-reference lint for a parsed pack.
 *
 * The schema checks each object in isolation; this pass checks the names
 * that point between them:
 *
 *   missing_fragment          {{fragment:x}} with no fragment x      error
 *   fragment_cycle            fragments that include each other      error
 *   dangling_tool             prompt lists a tool the pack lacks     warning
 *   unknown_blocklisted_tool  blocklist names a tool the pack lacks  warning
 *
 * Errors make rendering fail in strict mode (or always, for cycles).
 * Warnings are silently tolerated at lookup time but usually indicate a typo.
 */

import { TemplateEngine } from "../template/engine.js";
import type { PromptPack } from "./schema.js";

export type PackReferenceIssueKind =
  | "missing_fragment"
  | "dangling_tool"
  | "unknown_blocklisted_tool"
  | "fragment_cycle";

export type IssueSeverity = "error" | "warning";

export interface PackReferenceIssue {
  kind: PackReferenceIssueKind;
  /** Dotted path to the offending field, e.g. `prompts.support.tools`. */
  location: string;
  message: string;
  severity: IssueSeverity;
}

interface TemplateSource {
  location: string;
  template: string;
}

function templateSources(pack: PromptPack): TemplateSource[] {
  const sources: TemplateSource[] = [];

  for (const [name, body] of Object.entries(pack.fragments ?? {})) {
    sources.push({ location: `fragments.${name}`, template: body });
  }

  for (const [promptName, prompt] of Object.entries(pack.prompts)) {
    const base = `prompts.${promptName}`;
    sources.push({ location: `${base}.system_template`, template: prompt.system_template });

    for (const [model, override] of Object.entries(prompt.model_overrides ?? {})) {
      const overrideBase = `${base}.model_overrides.${model}`;
      const parts = {
        system_template: override.system_template,
        system_template_prefix: override.system_template_prefix,
        system_template_suffix: override.system_template_suffix,
      };
      for (const [field, template] of Object.entries(parts)) {
        if (template !== undefined) {
          sources.push({ location: `${overrideBase}.${field}`, template });
        }
      }
    }
  }

  return sources;
}

function findMissingFragments(pack: PromptPack, engine: TemplateEngine): PackReferenceIssue[] {
  const issues: PackReferenceIssue[] = [];
  for (const { location, template } of templateSources(pack)) {
    for (const name of engine.extractFragments(template)) {
      if (!engine.hasFragment(name)) {
        issues.push({
          kind: "missing_fragment",
          location,
          message: `Undefined fragment: ${name}`,
          severity: "error",
        });
      }
    }
  }
  return issues;
}

/**
 * Depth-first walk of the fragment include graph. Each cycle is reported
 * once, starting from the first fragment (in pack order) that lies on it.
 */
function findFragmentCycles(pack: PromptPack, engine: TemplateEngine): PackReferenceIssue[] {
  const fragments = pack.fragments ?? {};
  const issues: PackReferenceIssue[] = [];
  const reported = new Set<string>();
  const visited = new Set<string>();
  const visiting = new Set<string>();

  function visit(name: string, path: string[]): void {
    if (visiting.has(name)) {
      const cycle = [...path.slice(path.indexOf(name)), name];
      const key = [...new Set(cycle)].sort().join(",");
      if (!reported.has(key)) {
        reported.add(key);
        issues.push({
          kind: "fragment_cycle",
          location: `fragments.${name}`,
          message: `Fragment cycle detected: ${cycle.join(" -> ")}`,
          severity: "error",
        });
      }
      return;
    }
    if (visited.has(name) || !engine.hasFragment(name)) {
      return;
    }

    visiting.add(name);
    for (const child of engine.extractFragments(fragments[name] ?? "")) {
      visit(child, [...path, name]);
    }
    visiting.delete(name);
    visited.add(name);
  }

  for (const name of Object.keys(fragments)) {
    visit(name, []);
  }
  return issues;
}

function findToolIssues(pack: PromptPack): PackReferenceIssue[] {
  const issues: PackReferenceIssue[] = [];
  const known = new Set(Object.keys(pack.tools ?? {}));

  for (const [promptName, prompt] of Object.entries(pack.prompts)) {
    for (const tool of prompt.tools ?? []) {
      if (!known.has(tool)) {
        issues.push({
          kind: "dangling_tool",
          location: `prompts.${promptName}.tools`,
          message: `Tool '${tool}' is not defined in the pack`,
          severity: "warning",
        });
      }
    }
    for (const tool of prompt.tool_policy?.blocklist ?? []) {
      if (!known.has(tool)) {
        issues.push({
          kind: "unknown_blocklisted_tool",
          location: `prompts.${promptName}.tool_policy.blocklist`,
          message: `Blocklisted tool '${tool}' is not defined in the pack`,
          severity: "warning",
        });
      }
    }
  }
  return issues;
}

/**
 * Report every broken cross-reference in a pack. Never throws; an empty
 * list means every name resolves.
 */
export function checkPackReferences(pack: PromptPack): PackReferenceIssue[] {
  const engine = new TemplateEngine({ fragments: pack.fragments ?? {} });
  return [
    ...findMissingFragments(pack, engine),
    ...findFragmentCycles(pack, engine),
    ...findToolIssues(pack),
  ];
}

export function hasReferenceErrors(issues: readonly PackReferenceIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}

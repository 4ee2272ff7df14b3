import { ConfigurationError } from './Errors';
import { CompiledRule, NodeRule, RuleKind } from './Types';

/**
 * Resolve a declared rule kind into its tagged form.
 *
 *   prompt / negative_prompt / input_image / input_images  -> fixed kinds
 *   text | string (with paramName)                         -> TEXT(paramName)
 *   text:<name> | string:<name>                            -> TEXT(<name>)
 *   anything else                                          -> SCALAR(<kind>)
 *
 * A text rule with no usable name never writes anything, same as one whose
 * parameter is absent at render time, so it compiles to `null`.
 */
export function compileRule(rule: NodeRule): CompiledRule | null {
  const kind = rule.kind.trim().toLowerCase();
  if (!kind) return null;

  const target = { nodeIds: [...rule.nodeIds], inputKey: rule.inputKey };

  switch (kind) {
    case RuleKind.PROMPT:
      return { kind: RuleKind.PROMPT, ...target };
    case RuleKind.NEGATIVE_PROMPT:
      return { kind: RuleKind.NEGATIVE_PROMPT, ...target };
    case RuleKind.INPUT_IMAGE:
      return { kind: RuleKind.INPUT_IMAGE, ...target };
    case RuleKind.INPUT_IMAGES:
      return { kind: RuleKind.INPUT_IMAGES, ...target };
    case 'text':
    case 'string': {
      const param = (rule.paramName ?? '').trim().toLowerCase();
      return param ? { kind: RuleKind.TEXT, param, ...target } : null;
    }
  }

  if (kind.startsWith('text:') || kind.startsWith('string:')) {
    const param = kind.slice(kind.indexOf(':') + 1).trim();
    return param ? { kind: RuleKind.TEXT, param, ...target } : null;
  }

  // Names starting with "text"/"string" but not matching the forms above are
  // neither text rules nor scalar keys.
  if (kind.startsWith('text') || kind.startsWith('string')) return null;

  return { kind: RuleKind.SCALAR, param: kind, ...target };
}

export function compileRules(rules: NodeRule[]): CompiledRule[] {
  const compiled: CompiledRule[] = [];
  for (const rule of rules) {
    const c = compileRule(rule);
    if (c) compiled.push(c);
  }
  return compiled;
}

/**
 * Every node a rule targets must exist and own an `inputs` map.
 * Runs once per topic load; render relies on it.
 */
export function validateRulesAgainstGraph(
  graph: Readonly<Record<string, { inputs?: unknown }>>,
  rules: NodeRule[],
  topic: string | null = null,
): void {
  for (const rule of rules) {
    for (const nodeId of rule.nodeIds) {
      const node = Object.prototype.hasOwnProperty.call(graph, nodeId) ? graph[nodeId] : undefined;
      if (!node) {
        throw new ConfigurationError(
          `rule '${rule.kind}' references node ${nodeId} absent in workflow`,
          topic,
        );
      }
      if (typeof node.inputs !== 'object' || node.inputs === null || Array.isArray(node.inputs)) {
        throw new ConfigurationError(`workflow node ${nodeId} has no 'inputs'`, topic);
      }
    }
  }
}

export function hasRuleOfKind(rules: CompiledRule[], kind: RuleKind): boolean {
  return rules.some((r) => r.kind === kind);
}

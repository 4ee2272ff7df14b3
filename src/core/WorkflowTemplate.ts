import { randomInt } from 'node:crypto';
import { cloneGraph, WorkflowGraph } from './GraphPrimitives';
import { debug } from './log';
import { CompiledRule, JsonValue, NodeGraph, ParameterSet, ParamValue, RuleKind } from './Types';

/** Seeds are drawn from [0, 2^48). */
export const SEED_RANGE = 2 ** 48;

export type SeedSource = () => number;

export const randomSeed: SeedSource = () => randomInt(0, SEED_RANGE - 1);

/**
 * Lower-case every key and make sure `seed` is set, drawing one from
 * `seedSource` only when the caller gave none.
 */
export function resolveParams(params: ParameterSet, seedSource: SeedSource = randomSeed): ParameterSet {
  const resolved: ParameterSet = {};
  for (const [key, value] of Object.entries(params)) {
    resolved[key.toLowerCase()] = value;
  }
  if (resolved['seed'] === undefined) {
    resolved['seed'] = seedSource();
    debug('[template]', `Generated random seed: ${resolved['seed']}`);
  }
  return resolved;
}

function toJson(value: ParamValue): JsonValue {
  return Array.isArray(value) ? [...value] : value;
}

function writeAll(graph: WorkflowGraph, rule: CompiledRule, value: ParamValue): void {
  for (const nodeId of rule.nodeIds) {
    graph.setInput(nodeId, rule.inputKey, toJson(value));
  }
}

function stringList(value: ParamValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((v) => String(v));
}

/**
 * Build a concrete graph from a topic template.
 *
 * Passes run in a fixed order: prompt, negative prompt, named text fields,
 * single input image, input image list (with pruning of unused image nodes),
 * then every remaining rule keyed by its kind. A node pruned by the image-list
 * pass is skipped by any later rule that targets it.
 *
 * Neither `template` nor `params` is modified.
 */
export function render(
  template: NodeGraph,
  rules: CompiledRule[],
  prompt: string,
  params: ParameterSet,
  seedSource: SeedSource = randomSeed,
): NodeGraph {
  const graph = new WorkflowGraph(cloneGraph(template));
  const eff = resolveParams(params, seedSource);

  // 1) prompt
  for (const rule of rules) {
    if (rule.kind === RuleKind.PROMPT) writeAll(graph, rule, prompt);
  }

  // 2) negative prompt
  const negative = eff['negative_prompt'];
  for (const rule of rules) {
    if (rule.kind === RuleKind.NEGATIVE_PROMPT && negative !== undefined) {
      writeAll(graph, rule, negative);
    }
  }

  // 3) named text fields
  for (const rule of rules) {
    if (rule.kind !== RuleKind.TEXT) continue;
    const value = eff[rule.param];
    if (value !== undefined) writeAll(graph, rule, value);
  }

  // 4) single input image
  const inputImage = eff['input_image'];
  for (const rule of rules) {
    if (rule.kind === RuleKind.INPUT_IMAGE && inputImage !== undefined) {
      writeAll(graph, rule, inputImage);
    }
  }

  // 5) input image list; surplus image nodes are pruned
  const images = stringList(eff['input_images']);
  for (const rule of rules) {
    if (rule.kind !== RuleKind.INPUT_IMAGES) continue;

    const used = Math.min(images.length, rule.nodeIds.length);
    for (let i = 0; i < used; i++) {
      graph.setInput(rule.nodeIds[i], rule.inputKey, images[i]);
    }
    const pruned = graph.deleteNodes(rule.nodeIds.slice(used));
    if (pruned.length > 0) {
      debug('[template]', `Pruned unused image nodes: ${pruned.join(', ')}`);
    }
  }

  // 6) everything else, keyed by kind
  for (const rule of rules) {
    if (rule.kind !== RuleKind.SCALAR) continue;
    const value = eff[rule.param];
    if (value !== undefined) writeAll(graph, rule, value);
  }

  debug('[template]', `Workflow prepared: nodes=${graph.size}`);
  return graph.nodes;
}

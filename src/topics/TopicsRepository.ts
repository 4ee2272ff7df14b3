import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../core/Errors';
import { debug } from '../core/log';
import { compileRules, validateRulesAgainstGraph } from '../core/NodeRules';
import { CompiledRule, NodeGraph, NodeRule, ParameterSet } from '../core/Types';
import {
  formatIssues,
  InlineLimit,
  NodesFileSchema,
  TopicMetaSchema,
  WorkflowFile,
  WorkflowFileSchema,
} from './Schemas';

export const META_FILE = 'meta.json';
export const NODES_FILE = 'nodes.json';
export const WORKFLOW_FILE = 'workflow.json';

/** A loaded, validated topic. Immutable once loaded. */
export interface Topic {
  alias: string;
  title: string;
  description: string | null;
  /** Defaults from nodes.json; meta defaults are applied over these. */
  nodeDefaults: ParameterSet;
  defaults: ParameterSet;
  /** Lower-cased; `null` accepts every inline key. */
  inlineAllowed: string[] | null;
  inlineLimits: Record<string, InlineLimit>;
  workflow: NodeGraph;
  rules: NodeRule[];
  compiledRules: CompiledRule[];
}

/** What the job processor needs from topic discovery. */
export interface TopicSource {
  get(alias: string): Topic | null;
}

async function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, alias: string): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${path.basename(file)}: ${errorMessage(err)}`, alias);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${path.basename(file)}: ${formatIssues(parsed.error)}`, alias);
  }
  return parsed.data;
}

function toNodeGraph(workflow: WorkflowFile): NodeGraph {
  const graph: NodeGraph = {};
  for (const [nodeId, node] of Object.entries(workflow)) {
    graph[nodeId] = {
      class_type: node.class_type,
      inputs: node.inputs ?? {},
      ...(node._meta ? { _meta: node._meta } : {}),
    };
  }
  return graph;
}

function lowerKeys<T>(record: Record<string, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) out[key.toLowerCase()] = value;
  return out;
}

/**
 * Load one topic folder. Throws ConfigurationError for anything that would
 * make the topic unusable.
 */
export async function loadTopic(alias: string, dir: string): Promise<Topic> {
  const meta = await readJson(path.join(dir, META_FILE), TopicMetaSchema, alias);
  const nodes = await readJson(path.join(dir, NODES_FILE), NodesFileSchema, alias);
  const workflow = await readJson(path.join(dir, WORKFLOW_FILE), WorkflowFileSchema, alias);

  const rules: NodeRule[] = nodes.nodes.map((n) => {
    const param = n.param === null || n.param === undefined ? '' : String(n.param).trim();
    return {
      kind: n.type,
      nodeIds: [...n.node_ids],
      inputKey: n.key,
      ...(param ? { paramName: param } : {}),
    };
  });

  validateRulesAgainstGraph(workflow, rules, alias);

  return {
    alias,
    title: meta.title || alias,
    description: meta.description ?? null,
    nodeDefaults: nodes.defaults ?? {},
    defaults: meta.defaults ?? {},
    inlineAllowed: meta.inline_allowed ? meta.inline_allowed.map((k) => String(k).toLowerCase()) : null,
    inlineLimits: lowerKeys(meta.inline_limits ?? {}),
    workflow: toNodeGraph(workflow),
    rules,
    compiledRules: compileRules(rules),
  };
}

// ─────────────────────────────────────────────
// TopicsRepository — every sub-folder of `rootDir` is one topic, named by
// the folder. A topic that fails to load is logged and left out.
// ─────────────────────────────────────────────

export class TopicsRepository implements TopicSource {
  readonly rootDir: string;
  private topics: Map<string, Topic> = new Map();

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async reload(): Promise<number> {
    const loaded = new Map<string, Topic>();
    for (const alias of await this.listTopicDirs()) {
      try {
        loaded.set(alias, await loadTopic(alias, path.join(this.rootDir, alias)));
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        console.error(`[topics] Skipping topic ${alias}: ${err.message}`);
      }
    }
    this.topics = loaded;
    console.log(`[topics] Loaded ${loaded.size} topic(s) from ${this.rootDir}`);
    debug('[topics]', `aliases: ${[...loaded.keys()].join(', ')}`);
    return loaded.size;
  }

  get(alias: string): Topic | null {
    return this.topics.get(alias) ?? null;
  }

  all(): Topic[] {
    return [...this.topics.values()];
  }

  aliases(): string[] {
    return [...this.topics.keys()];
  }

  private async listTopicDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory())
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        console.warn(`[topics] Topics directory not found: ${this.rootDir}`);
        return [];
      }
      throw err;
    }
  }
}

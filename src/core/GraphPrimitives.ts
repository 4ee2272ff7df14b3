import { EdgeRef, JsonValue, NodeGraph, WorkflowNode } from './Types';

// ─────────────────────────────────────────────
// Edge — a link found inside a node's inputs
// ─────────────────────────────────────────────

export class Edge {
  readonly from_node_id: string;
  readonly output_index: number;
  readonly to_node_id: string;
  readonly to_input_name: string;

  constructor(
    fromNodeId: string,
    outputIndex: number,
    toNodeId: string,
    toInputName: string,
  ) {
    this.from_node_id = fromNodeId;
    this.output_index = outputIndex;
    this.to_node_id = toNodeId;
    this.to_input_name = toInputName;
  }

  toString(): string {
    return `Edge(${this.from_node_id}[${this.output_index}] -> ${this.to_node_id}.${this.to_input_name})`;
  }
}

/** `["<node id>", <output index>]` is the only edge shape the engine accepts. */
export function isEdgeRef(value: JsonValue | undefined): value is EdgeRef {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'number'
  );
}

export function cloneGraph(graph: NodeGraph): NodeGraph {
  return structuredClone(graph);
}

// ─────────────────────────────────────────────
// WorkflowGraph — arena-by-id view over a NodeGraph
//
// Nodes live in one record keyed by id; edges are not stored separately but
// derived from input values, so deleting a node is: drop its key, then drop
// every input elsewhere that still points at it.
// ─────────────────────────────────────────────

export class WorkflowGraph {
  readonly nodes: NodeGraph;

  constructor(nodes: NodeGraph) {
    this.nodes = nodes;
  }

  get size(): number {
    return Object.keys(this.nodes).length;
  }

  has(nodeId: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.nodes, nodeId);
  }

  get_node_by_id(nodeId: string): WorkflowNode | null {
    return this.has(nodeId) ? this.nodes[nodeId] : null;
  }

  /** Node ids whose class_type is one of `classTypes`. */
  find_nodes_by_class(classTypes: Iterable<string>): Set<string> {
    const wanted = new Set(classTypes);
    const found = new Set<string>();
    for (const [nodeId, node] of Object.entries(this.nodes)) {
      if (wanted.has(node.class_type)) found.add(nodeId);
    }
    return found;
  }

  edges(): Edge[] {
    const result: Edge[] = [];
    for (const [nodeId, node] of Object.entries(this.nodes)) {
      for (const [inputName, value] of Object.entries(node.inputs ?? {})) {
        if (isEdgeRef(value)) {
          result.push(new Edge(value[0], value[1], nodeId, inputName));
        }
      }
    }
    return result;
  }

  setInput(nodeId: string, inputName: string, value: JsonValue): boolean {
    const node = this.get_node_by_id(nodeId);
    if (!node) return false;
    node.inputs[inputName] = value;
    return true;
  }

  /**
   * Remove `nodeIds` and detach every input that referenced them.
   * Ids that are not present are ignored.
   */
  deleteNodes(nodeIds: Iterable<string>): string[] {
    const removed = new Set<string>();
    for (const nodeId of nodeIds) {
      if (this.has(nodeId)) removed.add(nodeId);
    }
    if (removed.size === 0) return [];

    for (const nodeId of removed) {
      delete this.nodes[nodeId];
    }

    for (const edge of this.edges()) {
      if (removed.has(edge.from_node_id)) {
        delete this.nodes[edge.to_node_id].inputs[edge.to_input_name];
      }
    }

    return [...removed];
  }
}

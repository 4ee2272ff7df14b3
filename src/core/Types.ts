/**
 * Wire-level value types for the engine's node-graph format.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** An input that points at another node's output: `[sourceNodeId, outputIndex]`. */
export type EdgeRef = [string, number];

export interface WorkflowNode {
  class_type: string;
  inputs: Record<string, JsonValue>;
  _meta?: Record<string, JsonValue>;
}

/** node id -> node record, exactly as posted to the engine. */
export type NodeGraph = Record<string, WorkflowNode>;

// ─────────────────────────────────────────────
// Parameters
// ─────────────────────────────────────────────

export type ParamScalar = string | number | boolean;
export type ParamValue = ParamScalar | ParamScalar[];

/** Keys are lower-cased before use. */
export type ParameterSet = Record<string, ParamValue>;

export namespace ParamValue {
  export function isParamValue(value: unknown): value is ParamValue {
    if (Array.isArray(value)) return value.every(isScalar);
    return isScalar(value);
  }

  export function isScalar(value: unknown): value is ParamScalar {
    return (
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      (typeof value === 'number' && Number.isFinite(value))
    );
  }
}

// ─────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────

/** A rule as declared in a topic's nodes file. */
export interface NodeRule {
  kind: string;
  nodeIds: string[];
  inputKey: string;
  paramName?: string;
}

export enum RuleKind {
  PROMPT = 'prompt',
  NEGATIVE_PROMPT = 'negative_prompt',
  TEXT = 'text',
  INPUT_IMAGE = 'input_image',
  INPUT_IMAGES = 'input_images',
  SCALAR = 'scalar',
}

interface RuleTarget {
  nodeIds: string[];
  inputKey: string;
}

/**
 * A rule resolved once at topic-load time. `param` is the lower-cased
 * parameter name the rule reads, where it reads one.
 */
export type CompiledRule =
  | ({ kind: RuleKind.PROMPT } & RuleTarget)
  | ({ kind: RuleKind.NEGATIVE_PROMPT } & RuleTarget)
  | ({ kind: RuleKind.TEXT; param: string } & RuleTarget)
  | ({ kind: RuleKind.INPUT_IMAGE } & RuleTarget)
  | ({ kind: RuleKind.INPUT_IMAGES } & RuleTarget)
  | ({ kind: RuleKind.SCALAR; param: string } & RuleTarget);

// ─────────────────────────────────────────────
// Execution events
// ─────────────────────────────────────────────

export enum ExecutionEventType {
  EXECUTING = 'executing',
  EXECUTION_ERROR = 'execution_error',
  OTHER = 'other',
}

export type ExecutionEvent =
  | { type: ExecutionEventType.EXECUTING; promptId: string; node: string | null }
  | { type: ExecutionEventType.EXECUTION_ERROR; promptId: string; message: string }
  | { type: ExecutionEventType.OTHER };

// ─────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────

export enum ArtifactKind {
  IMAGE = 'image',
  VIDEO = 'video',
  AUDIO = 'audio',
}

export namespace ArtifactKind {
  /** Default kind for a history output field, used when node classes say nothing. */
  export function fromOutputKey(key: string): ArtifactKind | null {
    switch (key) {
      case 'videos':
        return ArtifactKind.VIDEO;
      case 'images':
        return ArtifactKind.IMAGE;
      case 'audio':
      case 'audios':
        return ArtifactKind.AUDIO;
      default:
        return null;
    }
  }
}

export interface MediaArtifact {
  url: string;
  filename: string;
  subfolder: string;
  kind: ArtifactKind;
  mimeType: string;
}

export interface GenerationResult {
  artifacts: MediaArtifact[];
  queueDurationSeconds: number;
  execDurationSeconds: number;
}

import { z } from 'zod';
import { ExecutionEvent, ExecutionEventType } from '../core/Types';

// ─────────────────────────────────────────────
// HTTP responses
// ─────────────────────────────────────────────

export const PromptResponseSchema = z.object({
  prompt_id: z.string().min(1),
});

export const UploadResponseSchema = z
  .object({
    name: z.string().optional(),
    subfolder: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export const OutputFileSchema = z
  .object({
    filename: z.string(),
    subfolder: z.string().default(''),
    type: z.string().default('output'),
  })
  .passthrough();

export type OutputFile = z.infer<typeof OutputFileSchema>;

export const OUTPUT_KEYS = ['videos', 'images', 'audio', 'audios'] as const;
export type OutputKey = (typeof OUTPUT_KEYS)[number];

export const NodeOutputSchema = z
  .object({
    images: z.array(OutputFileSchema).optional(),
    videos: z.array(OutputFileSchema).optional(),
    audio: z.array(OutputFileSchema).optional(),
    audios: z.array(OutputFileSchema).optional(),
    animated: z.unknown().optional(),
  })
  .passthrough();

export type NodeOutput = z.infer<typeof NodeOutputSchema>;

export const HistoryEntrySchema = z
  .object({
    outputs: z.record(NodeOutputSchema).default({}),
  })
  .passthrough();

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const HistoryResponseSchema = z.record(HistoryEntrySchema);

/** Error body the engine returns on a rejected prompt. */
export const PromptErrorSchema = z
  .object({
    error: z.union([
      z.string(),
      z.object({ message: z.string() }).passthrough(),
    ]),
  })
  .passthrough();

// ─────────────────────────────────────────────
// Event frames
// ─────────────────────────────────────────────

const ExecutingFrameSchema = z.object({
  type: z.literal('executing'),
  data: z
    .object({
      prompt_id: z.string().nullish(),
      node: z.string().nullish(),
    })
    .passthrough(),
});

const ExecutionErrorFrameSchema = z.object({
  type: z.literal('execution_error'),
  data: z
    .object({
      prompt_id: z.string().nullish(),
      exception_message: z.string().nullish(),
    })
    .passthrough(),
});

export const DEFAULT_EXECUTION_ERROR = 'Engine execution error';

/** Unparseable or unknown frames become `OTHER`. */
export function parseExecutionEvent(text: string): ExecutionEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { type: ExecutionEventType.OTHER };
  }

  const executing = ExecutingFrameSchema.safeParse(raw);
  if (executing.success) {
    return {
      type: ExecutionEventType.EXECUTING,
      promptId: executing.data.data.prompt_id ?? '',
      node: executing.data.data.node ?? null,
    };
  }

  const failed = ExecutionErrorFrameSchema.safeParse(raw);
  if (failed.success) {
    return {
      type: ExecutionEventType.EXECUTION_ERROR,
      promptId: failed.data.data.prompt_id ?? '',
      message: failed.data.data.exception_message || DEFAULT_EXECUTION_ERROR,
    };
  }

  return { type: ExecutionEventType.OTHER };
}

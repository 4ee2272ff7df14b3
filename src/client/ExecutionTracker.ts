import { CanceledError, ProtocolError, TimeoutError } from '../core/Errors';
import { ChannelFrame, IClock, IEventChannel } from '../core/Interface';
import { debug } from '../core/log';
import { ExecutionEvent, ExecutionEventType } from '../core/Types';
import { parseExecutionEvent } from './Protocol';

// ─────────────────────────────────────────────
// TrackerState — where one submitted prompt stands
// ─────────────────────────────────────────────

export enum TrackerPhase {
  AWAITING = 'AWAITING',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

export interface TrackerState {
  phase: TrackerPhase;
  promptId: string;
  /** All timestamps are clock milliseconds. */
  submittedAt: number;
  execStartAt: number | null;
  execDoneAt: number | null;
  error: string | null;
}

export interface Timings {
  queueDurationSeconds: number;
  execDurationSeconds: number;
}

export function initialState(promptId: string, submittedAt: number): TrackerState {
  return {
    phase: TrackerPhase.AWAITING,
    promptId,
    submittedAt,
    execStartAt: null,
    execDoneAt: null,
    error: null,
  };
}

/**
 * Apply one event. Events for other prompts and `OTHER` events leave the
 * state untouched; so does anything arriving after a terminal phase.
 */
export function applyEvent(state: TrackerState, event: ExecutionEvent, now: number): TrackerState {
  if (state.phase !== TrackerPhase.AWAITING) return state;

  switch (event.type) {
    case ExecutionEventType.EXECUTING:
      if (event.promptId !== state.promptId) return state;
      if (event.node === null) {
        return { ...state, phase: TrackerPhase.DONE, execDoneAt: now };
      }
      if (state.execStartAt === null) {
        return { ...state, execStartAt: now };
      }
      return state;

    case ExecutionEventType.EXECUTION_ERROR:
      // An error frame with no prompt id is taken to be ours.
      if (event.promptId && event.promptId !== state.promptId) return state;
      return { ...state, phase: TrackerPhase.FAILED, error: event.message };

    default:
      return state;
  }
}

export function computeTimings(state: TrackerState, now: number): Timings {
  const doneAt = state.execDoneAt ?? now;
  if (state.execStartAt === null) {
    return {
      queueDurationSeconds: Math.max(0, doneAt - state.submittedAt) / 1000,
      execDurationSeconds: 0,
    };
  }
  return {
    queueDurationSeconds: Math.max(0, state.execStartAt - state.submittedAt) / 1000,
    execDurationSeconds: Math.max(0, doneAt - state.execStartAt) / 1000,
  };
}

export interface AwaitOptions {
  runTimeoutMs: number;
  eventTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Read frames from `channel` until the prompt finishes, fails, or the run
 * deadline (measured from `state.submittedAt`) passes. Binary frames are
 * previews and are skipped.
 */
export async function awaitCompletion(
  channel: IEventChannel,
  state: TrackerState,
  clock: IClock,
  options: AwaitOptions,
): Promise<TrackerState> {
  const deadline = state.submittedAt + options.runTimeoutMs;

  while (state.phase === TrackerPhase.AWAITING) {
    if (options.signal?.aborted) {
      throw new CanceledError(`Tracking of prompt ${state.promptId} was canceled`);
    }

    const now = clock.now();
    if (now > deadline) {
      throw new TimeoutError('Generation timeout exceeded', now - state.submittedAt);
    }

    const wait = Math.max(1, Math.min(options.eventTimeoutMs, deadline - now));
    let frame: ChannelFrame | null;
    try {
      frame = await channel.next(wait);
    } catch (err) {
      // Aborting closes the channel under us; report that as the cancellation.
      if (options.signal?.aborted) {
        throw new CanceledError(`Tracking of prompt ${state.promptId} was canceled`);
      }
      throw err;
    }
    if (frame === null || frame.binary) continue;

    const before = state;
    state = applyEvent(state, parseExecutionEvent(frame.data), clock.now());

    if (before.execStartAt === null && state.execStartAt !== null) {
      debug('[client]', `Execution start: prompt=${state.promptId}`);
    }
  }

  if (state.phase === TrackerPhase.FAILED) {
    throw new ProtocolError(state.error ?? 'Engine execution error', state.promptId);
  }

  debug('[client]', `Execution done: prompt=${state.promptId}`);
  return state;
}

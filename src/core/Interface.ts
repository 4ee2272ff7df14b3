import { GenerationResult, NodeGraph } from './Types';

// ─────────────────────────────────────────────
// Event channel
// ─────────────────────────────────────────────

export type ChannelFrame =
  | { binary: false; data: string }
  | { binary: true; data: Buffer };

export abstract class IEventChannel {
  /**
   * Next frame, or `null` if none arrived within `timeoutMs`.
   * Rejects once the channel has been closed by the remote side.
   */
  abstract next(timeoutMs: number): Promise<ChannelFrame | null>;
  abstract close(): void;
}

export interface ChannelOptions {
  headers: Record<string, string>;
  /** Upper bound on the opening handshake. */
  handshakeTimeoutMs: number;
  signal?: AbortSignal;
}

export type ChannelFactory = (url: string, options: ChannelOptions) => Promise<IEventChannel>;

// ─────────────────────────────────────────────
// Clock
// ─────────────────────────────────────────────

export abstract class IClock {
  /** Milliseconds on a monotonic scale. */
  abstract now(): number;
}

export class SystemClock extends IClock {
  now(): number {
    return performance.now();
  }
}

// ─────────────────────────────────────────────
// Generation client
// ─────────────────────────────────────────────

export interface TrackOptions {
  runTimeoutMs?: number;
  eventTimeoutMs?: number;
  signal?: AbortSignal;
}

export abstract class IGenerationClient {
  abstract submitAndTrack(graph: NodeGraph, options?: TrackOptions): Promise<GenerationResult>;
  abstract uploadInputAsset(bytes: Buffer, filename: string): Promise<string>;
  abstract fetchArtifactBytes(url: string): Promise<Buffer>;
  abstract healthCheck(): Promise<boolean>;
}

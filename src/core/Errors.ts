// ─────────────────────────────────────────────
// Error taxonomy. Every failure is terminal for its job; nothing retries.
// ─────────────────────────────────────────────

export class GatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Topic graph and rules disagree. Raised while loading a topic, never at render time. */
export class ConfigurationError extends GatewayError {
  readonly topic: string | null;

  constructor(message: string, topic: string | null = null) {
    super(message);
    this.topic = topic;
  }
}

/** The engine reported a failure. `message` is the engine's own text. */
export class ProtocolError extends GatewayError {
  readonly promptId: string | null;

  constructor(message: string, promptId: string | null = null) {
    super(message);
    this.promptId = promptId;
  }
}

/** No terminal event arrived within the run timeout. */
export class TimeoutError extends GatewayError {
  readonly elapsedMs: number;

  constructor(message: string, elapsedMs: number) {
    super(message);
    this.elapsedMs = elapsedMs;
  }
}

/** An input asset could not be uploaded; the job stops before submission. */
export class UploadError extends GatewayError {
  readonly filename: string;

  constructor(message: string, filename: string) {
    super(message);
    this.filename = filename;
  }
}

/** The awaiting call was aborted by its caller. */
export class CanceledError extends GatewayError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

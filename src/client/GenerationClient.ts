import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { CanceledError, errorMessage, ProtocolError, UploadError } from '../core/Errors';
import {
  ChannelFactory,
  IClock,
  IEventChannel,
  IGenerationClient,
  SystemClock,
  TrackOptions,
} from '../core/Interface';
import { debug } from '../core/log';
import { GenerationResult, NodeGraph } from '../core/Types';
import { collectArtifacts, DEFAULT_SAVE_CLASSES, SaveNodeClasses } from './Artifacts';
import { httpToWsUrl, WsEventChannel } from './EventChannel';
import { awaitCompletion, computeTimings, initialState } from './ExecutionTracker';
import {
  HistoryResponseSchema,
  PromptErrorSchema,
  PromptResponseSchema,
  UploadResponseSchema,
} from './Protocol';

export interface GenerationClientOptions {
  baseUrl: string;
  apiKey?: string | null;
  /** Longest single wait for an event frame. */
  eventTimeoutMs: number;
  /** Deadline for a whole run, counted from submission. */
  runTimeoutMs: number;
  saveClasses?: SaveNodeClasses;
  /** Overrides for tests: HTTP transport, event channel, clock. */
  adapter?: AxiosAdapter;
  openChannel?: ChannelFactory;
  clock?: IClock;
}

const UPLOAD_CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
};

function uploadContentType(filename: string): string {
  const ext = filename.slice(filename.lastIndexOf('.') + 1).toLowerCase();
  return UPLOAD_CONTENT_TYPES[ext] ?? 'image/png';
}

/** Best text for a failed engine request: the engine's own error if it sent one. */
function describeHttpError(err: unknown): string {
  if (err instanceof AxiosError && err.response) {
    const body = PromptErrorSchema.safeParse(err.response.data);
    if (body.success) {
      const e = body.data.error;
      return typeof e === 'string' ? e : e.message;
    }
    return `HTTP ${err.response.status}: ${err.message}`;
  }
  return errorMessage(err);
}

// ─────────────────────────────────────────────
// GenerationClient
//
//   POST /prompt          submit a graph
//   WS   /ws?clientId=    execution events
//   GET  /history/{id}    outputs of a finished prompt
//   GET  /view            artifact bytes
//   POST /upload/image    input assets
//   GET  /object_info     liveness
// ─────────────────────────────────────────────

export class GenerationClient extends IGenerationClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly headers: Record<string, string>;
  private readonly openChannel: ChannelFactory;
  private readonly clock: IClock;
  private readonly eventTimeoutMs: number;
  private readonly runTimeoutMs: number;
  private readonly saveClasses: SaveNodeClasses;

  constructor(options: GenerationClientOptions) {
    super();
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {};
    this.http = axios.create({
      baseURL: this.baseUrl,
      headers: this.headers,
      timeout: options.runTimeoutMs,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    this.openChannel = options.openChannel ?? ((url, channelOptions) => WsEventChannel.open(url, channelOptions));
    this.clock = options.clock ?? new SystemClock();
    this.eventTimeoutMs = options.eventTimeoutMs;
    this.runTimeoutMs = options.runTimeoutMs;
    this.saveClasses = options.saveClasses ?? DEFAULT_SAVE_CLASSES;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.http.get('/object_info');
      return true;
    } catch (err) {
      console.warn('[client] /object_info failed:', errorMessage(err));
      return false;
    }
  }

  /**
   * Submit `graph`, follow it on the event channel until it finishes, then
   * read its outputs from history. The channel is closed on every path out.
   */
  async submitAndTrack(graph: NodeGraph, options: TrackOptions = {}): Promise<GenerationResult> {
    const clientId = uuidv4();
    const wsUrl = `${httpToWsUrl(this.baseUrl)}/ws?clientId=${encodeURIComponent(clientId)}`;
    const eventTimeoutMs = options.eventTimeoutMs ?? this.eventTimeoutMs;
    const channel = await this.connect(wsUrl, eventTimeoutMs, options.signal);

    const onAbort = () => channel.close();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const promptId = await this.queuePrompt(graph, clientId);
      const submitted = initialState(promptId, this.clock.now());
      debug('[client]', `Prompt queued: prompt_id=${promptId} client_id=${clientId}`);

      const finished = await awaitCompletion(channel, submitted, this.clock, {
        runTimeoutMs: options.runTimeoutMs ?? this.runTimeoutMs,
        eventTimeoutMs,
        signal: options.signal,
      });
      const timings = computeTimings(finished, this.clock.now());

      const artifacts = collectArtifacts(
        await this.fetchHistory(promptId),
        graph,
        this.baseUrl,
        this.saveClasses,
      );

      debug(
        '[client]',
        `Collected ${artifacts.length} artifact(s); queue=${timings.queueDurationSeconds.toFixed(3)}s exec=${timings.execDurationSeconds.toFixed(3)}s`,
      );
      return { artifacts, ...timings };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      channel.close();
    }
  }

  /** Open the event channel; the handshake gets the same bound as one event wait. */
  private async connect(url: string, eventTimeoutMs: number, signal?: AbortSignal): Promise<IEventChannel> {
    try {
      return await this.openChannel(url, { headers: this.headers, handshakeTimeoutMs: eventTimeoutMs, signal });
    } catch (err) {
      if (err instanceof CanceledError) throw err;
      throw new ProtocolError(`Cannot open event channel: ${errorMessage(err)}`);
    }
  }

  private async queuePrompt(graph: NodeGraph, clientId: string): Promise<string> {
    let data: unknown;
    try {
      data = (await this.http.post('/prompt', { prompt: graph, client_id: clientId })).data;
    } catch (err) {
      throw new ProtocolError(describeHttpError(err));
    }
    const parsed = PromptResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError('Engine did not return a prompt_id');
    }
    return parsed.data.prompt_id;
  }

  private async fetchHistory(promptId: string) {
    const { data } = await this.http.get(`/history/${encodeURIComponent(promptId)}`);
    const parsed = HistoryResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed history for prompt ${promptId}`, promptId);
    }
    const entry = parsed.data[promptId];
    if (!entry) {
      throw new ProtocolError(`No history for prompt ${promptId}`, promptId);
    }
    debug('[client]', `History[${promptId}] output nodes: ${Object.keys(entry.outputs).join(', ')}`);
    return entry;
  }

  /**
   * Upload one input image into the engine's input folder and return the name
   * it was saved under. Callers upload one asset at a time.
   */
  async uploadInputAsset(bytes: Buffer, filename: string): Promise<string> {
    const form = new FormData();
    form.append('image', new Blob([bytes], { type: uploadContentType(filename) }), filename);
    form.append('type', 'input');

    let data: unknown;
    try {
      data = (await this.http.post('/upload/image', form)).data;
    } catch (err) {
      throw new UploadError(`Upload of ${filename} failed: ${describeHttpError(err)}`, filename);
    }
    const parsed = UploadResponseSchema.safeParse(data);
    return (parsed.success && parsed.data.name) || filename;
  }

  async fetchArtifactBytes(url: string): Promise<Buffer> {
    const { data } = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    return Buffer.from(data);
  }
}

import { errorMessage } from '../core/Errors';
import { AsyncQueue } from './AsyncQueue';
import { Job } from './Job';
import { Semaphore } from './Semaphore';

export type JobProcessor = (job: Job) => Promise<void>;

export interface SchedulerLimits {
  /** Jobs running at once across all topics. */
  maxWorkers: number;
  /** Workers per topic; also the most jobs one topic runs at once. */
  perTopicLimit: number;
}

/** `null` tells a worker to exit. */
type QueueItem = Job | null;

function limitEnabled(requesterId: number, limit: number | null | undefined): limit is number {
  return requesterId > 0 && typeof limit === 'number' && limit > 0;
}

// ─────────────────────────────────────────────
// JobScheduler
//
// Per-topic FIFO queues, each drained by a lazily started pool of workers,
// behind one global semaphore. Tracks pending (accepted, not started) jobs per
// requester and lets not-yet-started jobs be canceled.
//
// Every read-modify-write of the registry and the pending counters happens
// synchronously, with no await in between, so each public call below is
// atomic with respect to the workers.
// ─────────────────────────────────────────────

export class JobScheduler {
  readonly maxWorkers: number;
  readonly perTopicLimit: number;

  private readonly globalSemaphore: Semaphore;
  private readonly queues: Map<string, AsyncQueue<QueueItem>> = new Map();
  private readonly workers: Map<string, Promise<void>[]> = new Map();
  private readonly registry: Map<number, Job> = new Map();
  private readonly pendingByRequester: Map<number, number> = new Map();
  private readonly activePerTopic: Map<string, number> = new Map();
  private activeGlobal = 0;
  private processor: JobProcessor | null = null;
  private closed = false;

  constructor(limits: SchedulerLimits) {
    this.maxWorkers = Math.max(1, limits.maxWorkers);
    this.perTopicLimit = Math.max(1, limits.perTopicLimit);
    this.globalSemaphore = new Semaphore(this.maxWorkers);
    console.log(
      `[jobs] JobScheduler init: max_workers=${this.maxWorkers}, per_topic_limit=${this.perTopicLimit}`,
    );
  }

  /** Must be called before any job is admitted. */
  setProcessor(processor: JobProcessor): void {
    this.processor = processor;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─── Pending counters ───

  pendingCount(requesterId: number): number {
    return this.pendingByRequester.get(requesterId) ?? 0;
  }

  private incPending(requesterId: number): void {
    if (requesterId <= 0) return;
    this.pendingByRequester.set(requesterId, this.pendingCount(requesterId) + 1);
  }

  private decPending(requesterId: number): void {
    if (requesterId <= 0) return;
    const cur = this.pendingCount(requesterId);
    if (cur <= 1) {
      this.pendingByRequester.delete(requesterId);
    } else {
      this.pendingByRequester.set(requesterId, cur - 1);
    }
  }

  /** A non-positive limit or an unidentified requester always passes. */
  canEnqueue(requesterId: number, perRequesterLimit: number | null | undefined): boolean {
    if (!limitEnabled(requesterId, perRequesterLimit)) return true;
    return this.pendingCount(requesterId) < perRequesterLimit;
  }

  /**
   * Check the limit and take a pending slot in one step. Returns false when the
   * limit is reached, and also when there is no limit to reserve against.
   */
  reserveSlot(requesterId: number, limit: number | null | undefined): boolean {
    if (!limitEnabled(requesterId, limit)) return false;
    if (this.pendingCount(requesterId) >= limit) return false;
    this.incPending(requesterId);
    return true;
  }

  /** Give back a reserved slot. No-op when nothing is held. */
  releaseSlot(requesterId: number): void {
    this.decPending(requesterId);
  }

  // ─── Admission ───

  /**
   * Queue `job` on `alias`. With `reserved`, the requester's slot was already
   * taken by reserveSlot(); otherwise it is taken here. Returns false when the
   * scheduler is closed or has no processor; a reservation is then still held
   * by the caller.
   */
  enqueue(alias: string, job: Job, reserved: boolean = false): boolean {
    if (this.closed || this.processor === null) return false;
    const queue = this.ensureWorkers(alias);
    this.registry.set(job.placeholderMessageId, job);
    if (!reserved) this.incPending(job.requesterId);
    queue.put(job);
    return true;
  }

  /** Check the requester's limit and queue in one step. */
  enqueueLimited(alias: string, job: Job, perRequesterLimit: number | null | undefined): boolean {
    if (this.closed || this.processor === null) return false;
    if (!this.canEnqueue(job.requesterId, perRequesterLimit)) return false;
    return this.enqueue(alias, job, false);
  }

  /**
   * Guess whether a job queued now would wait. Only for choosing a status
   * label; the answer can be stale by the time the job is dequeued.
   */
  willQueue(alias: string): boolean {
    const queue = this.queues.get(alias);
    if (queue && queue.size() > 0) return true;
    if ((this.activePerTopic.get(alias) ?? 0) >= this.perTopicLimit) return true;
    return this.maxWorkers - this.activeGlobal <= 0;
  }

  // ─── Registry ───

  getJob(messageId: number): Job | null {
    return this.registry.get(messageId) ?? null;
  }

  /** Succeeds once, and only while the job has not started. */
  cancelJob(messageId: number, byAdmin: boolean = false): boolean {
    const job = this.registry.get(messageId);
    if (!job || job.started || job.canceled) return false;
    job.canceled = true;
    job.canceledByAdmin = byAdmin;
    this.decPending(job.requesterId);
    console.log(
      `[jobs] Job canceled (corr=${job.correlationId}, topic=${job.topicAlias}, by_admin=${byAdmin})`,
    );
    return true;
  }

  activeCount(alias?: string): number {
    return alias === undefined ? this.activeGlobal : this.activePerTopic.get(alias) ?? 0;
  }

  queuedCount(alias: string): number {
    return this.queues.get(alias)?.size() ?? 0;
  }

  // ─── Workers ───

  private ensureWorkers(alias: string): AsyncQueue<QueueItem> {
    let queue = this.queues.get(alias);
    if (!queue) {
      queue = new AsyncQueue<QueueItem>();
      this.queues.set(alias, queue);
    }
    if (!this.workers.has(alias)) {
      const pool: Promise<void>[] = [];
      for (let i = 0; i < this.perTopicLimit; i++) {
        pool.push(this.workerLoop(alias, queue));
      }
      this.workers.set(alias, pool);
    }
    return queue;
  }

  private async workerLoop(alias: string, queue: AsyncQueue<QueueItem>): Promise<void> {
    console.log(`[jobs] Worker started for topic: ${alias}`);
    try {
      while (true) {
        const job = await queue.get();
        if (job === null || this.closed) break;

        if (job.canceled) {
          this.registry.delete(job.placeholderMessageId);
          continue;
        }

        await this.globalSemaphore.acquire();

        // Shut down while waiting for the permit: the job counts as dropped.
        if (this.closed) {
          this.globalSemaphore.release();
          this.registry.delete(job.placeholderMessageId);
          console.log(`[jobs] Dropping job after shutdown (topic=${alias}, corr=${job.correlationId})`);
          break;
        }

        // Canceled while waiting for the permit: the slot was already freed.
        if (job.canceled) {
          this.globalSemaphore.release();
          this.registry.delete(job.placeholderMessageId);
          continue;
        }

        this.decPending(job.requesterId);
        job.started = true;
        this.activeGlobal++;
        this.activePerTopic.set(alias, (this.activePerTopic.get(alias) ?? 0) + 1);

        try {
          await this.runProcessor(alias, job);
        } finally {
          this.activeGlobal = Math.max(0, this.activeGlobal - 1);
          this.activePerTopic.set(alias, Math.max(0, (this.activePerTopic.get(alias) ?? 1) - 1));
          this.globalSemaphore.release();
          this.registry.delete(job.placeholderMessageId);
        }
      }
    } finally {
      console.log(`[jobs] Worker stopped for topic: ${alias}`);
    }
  }

  private async runProcessor(alias: string, job: Job): Promise<void> {
    const processor = this.processor;
    if (processor === null) {
      console.error(
        `[jobs] Processor is not set; dropping job (topic=${alias}, corr=${job.correlationId})`,
      );
      return;
    }
    try {
      await processor(job);
    } catch (err) {
      console.error(
        `[jobs] Job failed (topic=${alias}, corr=${job.correlationId}): ${errorMessage(err)}`,
      );
    }
  }

  /**
   * Stop admitting, let each worker finish the job it is running, then exit.
   * Jobs still queued are dropped.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    let dropped = 0;
    for (const [alias, queue] of this.queues) {
      dropped += queue.drain().filter((item) => item !== null).length;
      const pool = this.workers.get(alias) ?? [];
      for (let i = 0; i < pool.length; i++) queue.put(null);
    }
    if (dropped > 0) {
      console.log(`[jobs] Dropping ${dropped} queued job(s) on shutdown`);
    }

    await Promise.all([...this.workers.values()].flat());

    this.queues.clear();
    this.workers.clear();
    this.registry.clear();
    this.pendingByRequester.clear();
    this.activePerTopic.clear();
    this.activeGlobal = 0;
  }
}

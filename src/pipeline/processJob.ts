import { errorMessage, ProtocolError, TimeoutError } from '../core/Errors';
import { IGenerationClient } from '../core/Interface';
import { debug } from '../core/log';
import { hasRuleOfKind } from '../core/NodeRules';
import { GenerationResult, RuleKind } from '../core/Types';
import { randomSeed, render, SeedSource } from '../core/WorkflowTemplate';
import { Job } from '../scheduler/Job';
import { JobProcessor } from '../scheduler/JobScheduler';
import { TopicSource } from '../topics/TopicsRepository';
import { DeliveredArtifact, IDelivery, JobStatus } from './Delivery';
import { buildCaption } from './duration';

export const MAX_INPUT_IMAGES = 10;

export interface JobProcessorDeps {
  topics: TopicSource;
  client: IGenerationClient;
  delivery: IDelivery;
  runTimeoutMs: number;
  seedSource?: SeedSource;
  /** Epoch milliseconds; compared against `job.enqueuedAt`. */
  now?: () => number;
}

/**
 * The scheduler's processor: upload inputs, render, submit, deliver.
 * Every failure ends in exactly one status edit; nothing is retried.
 */
export function createJobProcessor(deps: JobProcessorDeps): JobProcessor {
  const { topics, client, delivery, runTimeoutMs } = deps;
  const seedSource = deps.seedSource ?? randomSeed;
  const now = deps.now ?? Date.now;

  return async (job: Job): Promise<void> => {
    if (job.canceled) return;

    console.log(
      `[pipeline] Processing job corr=${job.correlationId} topic=${job.topicAlias} user=${job.requesterId}`,
    );
    const topic = topics.get(job.topicAlias);
    if (!topic) {
      await delivery.editStatus(job, JobStatus.TOPIC_NOT_FOUND);
      return;
    }

    const params = { ...job.params };
    const needsImages = hasRuleOfKind(topic.compiledRules, RuleKind.INPUT_IMAGES);
    const needsImage = hasRuleOfKind(topic.compiledRules, RuleKind.INPUT_IMAGE);

    if ((needsImages && !job.inputImages?.length) || (needsImage && !job.inputImage)) {
      await delivery.editStatus(job, JobStatus.REQUIRES_INPUT_IMAGE);
      return;
    }

    try {
      if (needsImages && job.inputImages) {
        const names: string[] = [];
        // One at a time.
        for (const image of job.inputImages.slice(0, MAX_INPUT_IMAGES)) {
          names.push(await client.uploadInputAsset(image.bytes, image.filename));
        }
        params['input_images'] = names;
      }
      if (needsImage && job.inputImage) {
        const filename = job.inputImage.filename || `input_${job.correlationId}.png`;
        params['input_image'] = await client.uploadInputAsset(job.inputImage.bytes, filename);
      }
    } catch (err) {
      console.error(`[pipeline] Upload failed (corr=${job.correlationId}): ${errorMessage(err)}`);
      await delivery.editStatus(job, JobStatus.UPLOAD_FAILED, errorMessage(err));
      return;
    }

    const graph = render(topic.workflow, topic.compiledRules, job.prompt, params, seedSource);
    const localQueueSeconds = Math.max(0, (now() - job.enqueuedAt) / 1000);

    if (job.initiallyQueued) {
      try {
        await delivery.editStatus(job, JobStatus.GENERATING);
      } catch (err) {
        debug('[pipeline]', `Could not switch placeholder to generating: ${errorMessage(err)}`);
      }
    }

    let result: GenerationResult;
    try {
      result = await client.submitAndTrack(graph, { runTimeoutMs });
    } catch (err) {
      if (err instanceof TimeoutError) {
        await delivery.editStatus(job, JobStatus.TIMEOUT);
      } else if (err instanceof ProtocolError) {
        await delivery.editStatus(job, JobStatus.ENGINE_ERROR, err.message);
      } else {
        console.error(`[pipeline] Generation failed (corr=${job.correlationId}): ${errorMessage(err)}`);
        await delivery.editStatus(job, JobStatus.FAILED);
      }
      return;
    }

    if (result.artifacts.length === 0) {
      await delivery.editStatus(job, JobStatus.NO_MEDIA);
      return;
    }

    const caption = buildCaption(
      job.prompt,
      localQueueSeconds,
      result.queueDurationSeconds,
      result.execDurationSeconds,
    );
    const delivered: DeliveredArtifact[] = [];
    try {
      for (const artifact of result.artifacts) {
        delivered.push({ ...artifact, bytes: await client.fetchArtifactBytes(artifact.url) });
      }
      await delivery.deliverArtifacts(job, delivered, caption);
    } catch (err) {
      console.error(`[pipeline] Delivery failed (corr=${job.correlationId}): ${errorMessage(err)}`);
      await delivery.editStatus(job, JobStatus.FAILED);
      return;
    }

    console.log(
      `[pipeline] Job done corr=${job.correlationId}, media=${delivered.length}, ` +
        `local_queue=${localQueueSeconds.toFixed(2)}s, engine_queue=${result.queueDurationSeconds.toFixed(2)}s, ` +
        `exec=${result.execDurationSeconds.toFixed(2)}s`,
    );
  };
}

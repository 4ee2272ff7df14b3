import { GenerationClient } from './client/GenerationClient';
import { AppConfig } from './config/AppConfig';
import { errorMessage } from './core/Errors';
import { setLogLevel } from './core/log';
import { IDelivery } from './pipeline/Delivery';
import { createJobProcessor } from './pipeline/processJob';
import { JobProcessor, JobScheduler } from './scheduler/JobScheduler';
import { TopicsRepository } from './topics/TopicsRepository';

export interface Gateway {
  config: AppConfig;
  topics: TopicsRepository;
  client: GenerationClient;
  scheduler: JobScheduler;
  processor: JobProcessor;
}

/** Wire topics, engine client and scheduler; the processor reports to `delivery`. */
export async function createGateway(config: AppConfig, delivery: IDelivery): Promise<Gateway> {
  setLogLevel(config.logLevel);

  const topics = new TopicsRepository(config.topicsDir);
  await topics.reload();

  const client = new GenerationClient({
    baseUrl: config.engineBaseUrl,
    apiKey: config.engineApiKey,
    eventTimeoutMs: config.eventTimeoutMs,
    runTimeoutMs: config.runTimeoutMs,
  });

  const scheduler = new JobScheduler({
    maxWorkers: config.maxWorkers,
    perTopicLimit: config.perTopicLimit,
  });
  const processor = createJobProcessor({ topics, client, delivery, runTimeoutMs: config.runTimeoutMs });
  scheduler.setProcessor(processor);

  return { config, topics, client, scheduler, processor };
}

/** SIGINT/SIGTERM stop the scheduler once; returns a function that removes the handlers. */
export function installShutdownHandlers(scheduler: JobScheduler): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`[jobs] ${signal} received, shutting down`);
    scheduler.shutdown().catch((err: unknown) => {
      console.error(`[jobs] Shutdown failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

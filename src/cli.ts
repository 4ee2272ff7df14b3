#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig, loadDotenv } from './config/AppConfig';
import { errorMessage } from './core/Errors';
import { createGateway, Gateway, installShutdownHandlers } from './gateway';
import { FileDelivery } from './pipeline/FileDelivery';
import { mergeParams, parseInlineParams } from './pipeline/params';
import { InputAsset, createJob } from './scheduler/Job';

async function readInputs(files: string[]): Promise<InputAsset[]> {
  const assets: InputAsset[] = [];
  for (const file of files) {
    assets.push({ bytes: await fs.readFile(file), filename: path.basename(file) });
  }
  return assets;
}

async function runTopics(): Promise<void> {
  const gateway = await createGateway(loadConfig(), new FileDelivery('.'));
  for (const topic of gateway.topics.all()) {
    const kinds = [...new Set(topic.compiledRules.map((r) => r.kind))].join(', ');
    console.log(`${topic.alias}\t${topic.title}\t[${kinds}]`);
  }
  await gateway.scheduler.shutdown();
}

async function runCheck(): Promise<void> {
  const gateway = await createGateway(loadConfig(), new FileDelivery('.'));
  const ok = await gateway.client.healthCheck();
  console.log(ok ? `Engine at ${gateway.config.engineBaseUrl} is up` : `Engine at ${gateway.config.engineBaseUrl} is unreachable`);
  if (!ok) process.exitCode = 1;
  await gateway.scheduler.shutdown();
}

async function runGenerate(alias: string, words: string[], images: string[], outDir: string): Promise<void> {
  const delivery = new FileDelivery(outDir);
  const gateway = await createGateway(loadConfig(), delivery);
  const { scheduler, topics, config } = gateway;
  const removeHandlers = installShutdownHandlers(scheduler);

  try {
    const topic = topics.get(alias);
    if (!topic) {
      console.error(`Unknown topic '${alias}'. Known: ${topics.aliases().join(', ') || '(none)'}`);
      process.exitCode = 1;
      return;
    }

    const { prompt, params: inline } = parseInlineParams(words.join(' '));
    const inputs = await readInputs(images);
    const job = createJob({
      chatId: 0,
      placeholderMessageId: 1,
      requesterId: 0,
      topicAlias: alias,
      prompt,
      params: mergeParams(topic, inline),
      inputImage: inputs[0] ?? null,
      inputImages: inputs.length > 0 ? inputs : null,
      initiallyQueued: scheduler.willQueue(alias),
    });

    const settled = settleAfterProcessing(gateway);
    if (!scheduler.enqueueLimited(alias, job, config.perRequesterPending)) {
      console.error('Job was not accepted');
      process.exitCode = 1;
      return;
    }
    await settled;

    if (delivery.written.length === 0) process.exitCode = 1;
  } finally {
    removeHandlers();
    await scheduler.shutdown();
  }
}

/** Resolves once the processor has handled one job, whatever the outcome. */
function settleAfterProcessing(gateway: Gateway): Promise<void> {
  const { scheduler, processor } = gateway;
  return new Promise<void>((resolve) => {
    scheduler.setProcessor(async (job) => {
      try {
        await processor(job);
      } finally {
        resolve();
      }
    });
  });
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  loadDotenv();
  await yargs(argv)
    .scriptName('graph-gateway')
    .command('topics', 'List loaded topics', {}, () => runTopics())
    .command('check', 'Probe the engine', {}, () => runCheck())
    .command(
      'generate <alias> <prompt..>',
      'Run one generation and write its artifacts',
      (y) =>
        y
          .positional('alias', { type: 'string', demandOption: true })
          .positional('prompt', { type: 'string', array: true, demandOption: true })
          .option('image', { type: 'string', array: true, default: [] as string[], description: 'Input image file' })
          .option('out', { type: 'string', default: './out', description: 'Output directory' }),
      (args) => runGenerate(args.alias, args.prompt, args.image, args.out),
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
}

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Job } from '../scheduler/Job';
import { DeliveredArtifact, IDelivery, JobStatus } from './Delivery';

/** Flat file name: subfolder segments and the base name joined with `_` (`video/clip.mp4` -> `video_clip.mp4`). */
export function outputName(artifact: Pick<DeliveredArtifact, 'subfolder' | 'filename'>): string {
  const parts = [...artifact.subfolder.split(/[\\/]+/), path.basename(artifact.filename)];
  return parts.filter((p) => p && p !== '.' && p !== '..').join('_');
}

/** Writes artifacts into a directory and reports status on the console. */
export class FileDelivery extends IDelivery {
  readonly outDir: string;
  readonly written: string[] = [];
  lastStatus: JobStatus | null = null;

  constructor(outDir: string) {
    super();
    this.outDir = outDir;
  }

  async editStatus(job: Job, status: JobStatus, detail?: string): Promise<void> {
    this.lastStatus = status;
    console.log(`[pipeline] ${job.topicAlias}#${job.placeholderMessageId}: ${JobStatus.describe(status, detail)}`);
  }

  async deliverArtifacts(job: Job, artifacts: DeliveredArtifact[], caption: string): Promise<void> {
    await fs.mkdir(this.outDir, { recursive: true });
    for (const artifact of artifacts) {
      const target = path.join(this.outDir, outputName(artifact));
      await fs.writeFile(target, artifact.bytes);
      this.written.push(target);
      console.log(`[pipeline] Wrote ${artifact.kind} ${target} (${artifact.mimeType}, ${artifact.bytes.length} bytes)`);
    }
    console.log(caption);
  }
}

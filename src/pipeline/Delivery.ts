import { MediaArtifact } from '../core/Types';
import { Job } from '../scheduler/Job';

export enum JobStatus {
  GENERATING = 'generating',
  TOPIC_NOT_FOUND = 'topic_not_found',
  REQUIRES_INPUT_IMAGE = 'requires_input_image',
  UPLOAD_FAILED = 'upload_failed',
  TIMEOUT = 'timeout',
  ENGINE_ERROR = 'engine_error',
  FAILED = 'failed',
  NO_MEDIA = 'no_media',
}

export namespace JobStatus {
  export function describe(status: JobStatus, detail?: string): string {
    switch (status) {
      case JobStatus.GENERATING:
        return 'Generating...';
      case JobStatus.TOPIC_NOT_FOUND:
        return 'Topic not found';
      case JobStatus.REQUIRES_INPUT_IMAGE:
        return 'This topic requires an input image';
      case JobStatus.UPLOAD_FAILED:
        return 'Uploading the input image failed';
      case JobStatus.TIMEOUT:
        return 'Generation timed out';
      case JobStatus.ENGINE_ERROR:
        return `Engine error: ${detail ?? 'unknown'}`;
      case JobStatus.FAILED:
        return 'Generation failed';
      case JobStatus.NO_MEDIA:
        return 'The engine returned no media';
    }
  }
}

export interface DeliveredArtifact extends MediaArtifact {
  bytes: Buffer;
}

/**
 * The front end a job reports to. `editStatus` replaces the job's placeholder
 * text; `deliverArtifacts` replaces it with the results.
 */
export abstract class IDelivery {
  abstract editStatus(job: Job, status: JobStatus, detail?: string): Promise<void>;
  abstract deliverArtifacts(job: Job, artifacts: DeliveredArtifact[], caption: string): Promise<void>;
}

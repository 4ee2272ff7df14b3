import { v4 as uuidv4 } from 'uuid';
import { ParameterSet } from '../core/Types';

export interface InputAsset {
  bytes: Buffer;
  filename: string;
}

/**
 * One generation request. `placeholderMessageId` identifies it in the
 * scheduler's registry. Only the scheduler flips `started` and `canceled`.
 */
export interface Job {
  chatId: number;
  threadId: number;
  placeholderMessageId: number;
  requesterId: number;
  topicAlias: string;
  prompt: string;
  params: ParameterSet;
  inputImage: InputAsset | null;
  inputImages: InputAsset[] | null;
  correlationId: string;
  /** Epoch milliseconds at acceptance. */
  enqueuedAt: number;
  initiallyQueued: boolean;
  canceled: boolean;
  canceledByAdmin: boolean;
  started: boolean;
}

export type JobInit = Pick<Job, 'chatId' | 'placeholderMessageId' | 'requesterId' | 'topicAlias' | 'prompt'> &
  Partial<Pick<Job, 'threadId' | 'params' | 'inputImage' | 'inputImages' | 'initiallyQueued' | 'correlationId' | 'enqueuedAt'>>;

export function createJob(init: JobInit): Job {
  return {
    chatId: init.chatId,
    threadId: init.threadId ?? 0,
    placeholderMessageId: init.placeholderMessageId,
    requesterId: init.requesterId,
    topicAlias: init.topicAlias,
    prompt: init.prompt,
    params: { ...(init.params ?? {}) },
    inputImage: init.inputImage ?? null,
    inputImages: init.inputImages ?? null,
    correlationId: init.correlationId ?? uuidv4().replace(/-/g, '').slice(0, 12),
    enqueuedAt: init.enqueuedAt ?? Date.now(),
    initiallyQueued: init.initiallyQueued ?? false,
    canceled: false,
    canceledByAdmin: false,
    started: false,
  };
}

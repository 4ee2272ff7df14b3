export * from './core';
export { GenerationClient, GenerationClientOptions } from './client/GenerationClient';
export { WsEventChannel, httpToWsUrl } from './client/EventChannel';
export { collectArtifacts, guessMimeType, DEFAULT_SAVE_CLASSES, SaveNodeClasses } from './client/Artifacts';
export { parseExecutionEvent } from './client/Protocol';
export { Job, InputAsset, createJob } from './scheduler/Job';
export { JobScheduler, JobProcessor, SchedulerLimits } from './scheduler/JobScheduler';
export { Topic, TopicSource, TopicsRepository, loadTopic } from './topics/TopicsRepository';
export { parseInlineParams, mergeParams } from './pipeline/params';
export { formatDuration, buildCaption } from './pipeline/duration';
export { IDelivery, DeliveredArtifact, JobStatus } from './pipeline/Delivery';
export { FileDelivery } from './pipeline/FileDelivery';
export { createJobProcessor, JobProcessorDeps, MAX_INPUT_IMAGES } from './pipeline/processJob';
export { AppConfig, loadConfig, loadDotenv } from './config/AppConfig';
export { createGateway, installShutdownHandlers, Gateway } from './gateway';

export * from '../types';
export { setDebugMode, isDebugModeEnabled } from './debug';
export { ClientConfigLoader, ConfigError, DEFAULT_BASE_URL, API_KEY_PREFIX } from './api-config';
export { ControlPlaneClient, ApiRequestError } from './control-plane-client';
export type { FetchLike, ControlPlaneOptions } from './control-plane-client';
export { resolveContentType } from './mime';
export { MAX_DURATION_MS, MAX_FILE_SIZE_BYTES } from './upload-limits';
export {
  UploadError,
  ProbeError,
  InvalidMetadataError,
  LimitExceededError,
  PolicyRejectedError,
  DurationExceededError,
  SizeExceededError,
  TransportFailureError,
  UploadErrorHandler,
} from './upload-errors';
export { createFfprobeRunner, FfprobeMissingError, MetadataProbe, runFfprobe } from './video-probe';
export type { FfprobeRunner } from './video-probe';
export {
  LegacyUploadNegotiator,
  UpfrontUploadNegotiator,
  createUploadNegotiator,
} from './upload-negotiator';
export type { UploadNegotiator } from './upload-negotiator';
export { TransferExecutor } from './transfer-executor';
export { UploadFinalizer } from './upload-finalizer';
export { UploadOrchestrator, createUploader, uploadVideo } from './upload-orchestrator';
export type { UploaderOptions, StateChange } from './upload-orchestrator';
export { AgentRunClient, parseVideoIds } from './agent-runs';
export { AuthChecker } from './auth-check';
export { WebhookHistory } from './webhook-history';
export { createWebhookApp, formatWebhookEvent } from './webhook-listener';

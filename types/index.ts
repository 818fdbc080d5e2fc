export interface MetadataOverride {
  width?: number;
  height?: number;
  durationMs?: number;
}

export interface UploadRequest {
  filePath: string;
  contentType?: string;
  metadata?: MetadataOverride;
}

export interface VideoMetadata {
  filename: string;
  width: number;
  height: number;
  durationMs: number;
  fileSize: number;
  contentType: string;
}

export type UploadFlow = 'legacy' | 'upfront';

export type TransferMethod = 'signed-form' | 'resumable-post' | 'resumable-put';

export type SignedFormField = readonly [name: string, value: string];

export interface SignedFormTarget {
  method: 'signed-form';
  videoId: string;
  uploadUrl: string;
  fields: ReadonlyArray<SignedFormField>;
}

export interface ResumableTarget {
  method: 'resumable-post' | 'resumable-put';
  videoId: string;
  uploadUrl: string;
}

export type UploadTarget = SignedFormTarget | ResumableTarget;

export type UploadStage = 'probe' | 'negotiate' | 'transfer' | 'finalize';

export type UploadState =
  | 'idle'
  | 'probed'
  | 'negotiated'
  | 'transferred'
  | 'finalized'
  | 'failed';

export type LimitKind = 'duration' | 'size';

export type RejectionKind =
  | 'ProbeError'
  | 'InvalidMetadata'
  | 'LimitExceeded'
  | 'PolicyRejected'
  | 'DurationExceeded'
  | 'SizeExceeded';

export type TransportFailureKind =
  | 'NegotiationTransportFailure'
  | 'TransferTransportFailure'
  | 'FinalizeTransportFailure';

export type UploadErrorKind = RejectionKind | TransportFailureKind;

export interface UploadSuccess {
  type: 'success';
  videoId: string;
}

export interface UploadRejected {
  type: 'rejected';
  stage: UploadStage;
  kind: RejectionKind;
  reason: string;
  limit?: LimitKind;
  status?: number;
  videoId?: string;
}

export interface UploadTransportFailure {
  type: 'transport-failure';
  stage: UploadStage;
  kind: TransportFailureKind;
  status?: number;
  body: string;
  detail: string;
  videoId?: string;
}

export type UploadOutcome = UploadSuccess | UploadRejected | UploadTransportFailure;

export interface AgentRunOutput {
  video_url?: string;
  url?: string;
  thumbnail_url?: string;
}

export interface AgentRunStatus {
  status?: string;
  outputs?: AgentRunOutput[];
  [key: string]: unknown;
}

export interface WebhookHistoryEntry {
  timestamp: string;
  path: string;
  token: string | null;
  data: Record<string, unknown>;
}

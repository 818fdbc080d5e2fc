import {
  LimitKind,
  TransportFailureKind,
  UploadErrorKind,
  UploadOutcome,
  UploadStage,
} from '../types';
import { MAX_DURATION_MINUTES } from './upload-limits';

export interface UploadErrorOptions {
  status?: number;
  body?: string;
  limit?: LimitKind;
  cause?: unknown;
}

export class UploadError extends Error {
  public readonly kind: UploadErrorKind;
  public readonly stage: UploadStage;
  public readonly status?: number;
  public readonly body: string;
  public readonly limit?: LimitKind;

  constructor(
    message: string,
    kind: UploadErrorKind,
    stage: UploadStage,
    options: UploadErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UploadError';
    this.kind = kind;
    this.stage = stage;
    this.status = options.status;
    this.body = options.body ?? '';
    this.limit = options.limit;
  }

  get isRejection(): boolean {
    return !isTransportFailureKind(this.kind);
  }
}

const TRANSPORT_FAILURE_KINDS: readonly TransportFailureKind[] = [
  'NegotiationTransportFailure',
  'TransferTransportFailure',
  'FinalizeTransportFailure',
];

export function isTransportFailureKind(kind: UploadErrorKind): kind is TransportFailureKind {
  return TRANSPORT_FAILURE_KINDS.some((candidate) => candidate === kind);
}

const TRANSPORT_FAILURE_BY_STAGE: Record<UploadStage, TransportFailureKind> = {
  probe: 'NegotiationTransportFailure',
  negotiate: 'NegotiationTransportFailure',
  transfer: 'TransferTransportFailure',
  finalize: 'FinalizeTransportFailure',
};

export class ProbeError extends UploadError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ProbeError', 'probe', { cause });
    this.name = 'ProbeError';
  }
}

export class InvalidMetadataError extends UploadError {
  constructor(message: string, status: number, body: string) {
    super(message, 'InvalidMetadata', 'negotiate', { status, body });
    this.name = 'InvalidMetadataError';
  }
}

export class LimitExceededError extends UploadError {
  constructor(message: string, limit: LimitKind, status?: number, body?: string) {
    super(message, 'LimitExceeded', 'negotiate', { status, body, limit });
    this.name = 'LimitExceededError';
  }
}

export class PolicyRejectedError extends UploadError {
  constructor(message: string, status: number, body: string) {
    super(message, 'PolicyRejected', 'transfer', { status, body });
    this.name = 'PolicyRejectedError';
  }
}

export class DurationExceededError extends UploadError {
  constructor(message: string, status: number, body: string) {
    super(message, 'DurationExceeded', 'finalize', { status, body, limit: 'duration' });
    this.name = 'DurationExceededError';
  }
}

export class SizeExceededError extends UploadError {
  constructor(message: string, status: number, body: string) {
    super(message, 'SizeExceeded', 'finalize', { status, body, limit: 'size' });
    this.name = 'SizeExceededError';
  }
}

export class TransportFailureError extends UploadError {
  constructor(
    message: string,
    stage: UploadStage,
    options: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, TRANSPORT_FAILURE_BY_STAGE[stage], stage, options);
    this.name = 'TransportFailureError';
  }
}

export class UploadErrorHandler {
  /**
   * Convert anything thrown inside the pipeline into an outcome. Errors that
   * are not UploadErrors count as a probe rejection during probe and as a
   * transport failure of the running stage otherwise.
   */
  static toOutcome(error: unknown, stage: UploadStage, videoId?: string): UploadOutcome {
    if (error instanceof UploadError) {
      const kind = error.kind;
      if (isTransportFailureKind(kind)) {
        return {
          type: 'transport-failure',
          stage: error.stage,
          kind,
          status: error.status,
          body: error.body,
          detail: error.message,
          videoId,
        };
      }
      return {
        type: 'rejected',
        stage: error.stage,
        kind,
        reason: error.message,
        limit: error.limit,
        status: error.status,
        videoId,
      };
    }

    const detail = error instanceof Error ? error.message : String(error);
    if (stage === 'probe') {
      return { type: 'rejected', stage, kind: 'ProbeError', reason: detail, videoId };
    }
    return {
      type: 'transport-failure',
      stage,
      kind: TRANSPORT_FAILURE_BY_STAGE[stage],
      body: '',
      detail,
      videoId,
    };
  }

  /**
   * Retrying the whole pipeline only makes sense for transport failures that
   * look transient.
   */
  static isRetryable(outcome: UploadOutcome): boolean {
    if (outcome.type !== 'transport-failure') return false;
    if (outcome.status === undefined) return true;
    return outcome.status === 408 || outcome.status === 429 || outcome.status >= 500;
  }

  static getUserMessage(outcome: UploadOutcome): string {
    if (outcome.type === 'success') {
      return `Upload complete. Video ID: ${outcome.videoId}`;
    }

    if (outcome.type === 'transport-failure') {
      const status = outcome.status === undefined ? 'no response' : `status ${outcome.status}`;
      switch (outcome.kind) {
        case 'NegotiationTransportFailure':
          return `Upload service unavailable while requesting an upload URL (${status}): ${outcome.detail}`;
        case 'TransferTransportFailure':
          return `Storage transfer failed (${status}): ${outcome.detail}`;
        case 'FinalizeTransportFailure':
          return `Upload service unavailable while finalizing (${status}): ${outcome.detail}`;
      }
    }

    switch (outcome.kind) {
      case 'ProbeError':
        return `Cannot read the video file: ${outcome.reason}`;
      case 'InvalidMetadata':
        return `The upload service rejected the video metadata: ${outcome.reason}`;
      case 'LimitExceeded':
        return outcome.limit === 'duration'
          ? `Video exceeds the ${MAX_DURATION_MINUTES}-minute limit and was rejected before upload.`
          : 'Video exceeds the 5 GB size limit and was rejected before upload.';
      case 'PolicyRejected':
        return 'Storage rejected the file: it exceeds the 5 GB upload policy.';
      case 'DurationExceeded':
        return `Video exceeds the ${MAX_DURATION_MINUTES}-minute limit.`;
      case 'SizeExceeded':
        return `Video exceeds the 5 GB size limit: ${outcome.reason}`;
    }
  }
}

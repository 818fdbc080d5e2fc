import { UploadFlow, UploadOutcome, UploadRequest, UploadStage, UploadState, UploadTarget, VideoMetadata } from '../types';
import { DEFAULT_CONTROL_TIMEOUT_MS, DEFAULT_TRANSFER_TIMEOUT_MS } from './api-config';
import { ControlPlaneClient, FetchLike } from './control-plane-client';
import { log } from './debug';
import { UploadErrorHandler } from './upload-errors';
import { UploadFinalizer } from './upload-finalizer';
import { createUploadNegotiator, UploadNegotiator } from './upload-negotiator';
import { TransferExecutor } from './transfer-executor';
import { FfprobeRunner, MetadataProbe } from './video-probe';

export interface StateChange {
  state: UploadState;
  stage?: UploadStage;
  metadata?: VideoMetadata;
  target?: UploadTarget;
  outcome?: UploadOutcome;
}

export interface UploadPipeline {
  probe: Pick<MetadataProbe, 'probe'>;
  negotiator: UploadNegotiator;
  executor: Pick<TransferExecutor, 'transfer'>;
  finalizer: Pick<UploadFinalizer, 'finalize'>;
  onStateChange?: (change: StateChange) => void;
}

/**
 * Runs probe, negotiate, transfer and finalize strictly in order. Any failure
 * ends the attempt; nothing is retried here.
 */
export class UploadOrchestrator {
  private pipeline: UploadPipeline;

  constructor(pipeline: UploadPipeline) {
    this.pipeline = pipeline;
  }

  get flow(): UploadFlow {
    return this.pipeline.negotiator.flow;
  }

  async upload(request: UploadRequest): Promise<UploadOutcome> {
    const { probe, negotiator, executor, finalizer } = this.pipeline;
    let stage: UploadStage = 'probe';
    let videoId: string | undefined;

    this.emit({ state: 'idle' });

    try {
      const metadata = await probe.probe(request);
      this.emit({ state: 'probed', metadata });

      stage = 'negotiate';
      const target = await negotiator.negotiate(metadata);
      videoId = target.videoId;
      this.emit({ state: 'negotiated', metadata, target });

      stage = 'transfer';
      await executor.transfer(target, { filePath: request.filePath, metadata });
      this.emit({ state: 'transferred', metadata, target });

      stage = 'finalize';
      await finalizer.finalize(target.videoId);

      const outcome: UploadOutcome = { type: 'success', videoId: target.videoId };
      this.emit({ state: 'finalized', outcome });
      log(`Upload complete: ${target.videoId}`);
      return outcome;
    } catch (error) {
      const outcome = UploadErrorHandler.toOutcome(error, stage, videoId);
      log(`Upload failed during ${stage}: %o`, outcome);
      this.emit({ state: 'failed', stage, outcome });
      return outcome;
    }
  }

  private emit(change: StateChange): void {
    this.pipeline.onStateChange?.(change);
  }
}

export interface UploaderOptions {
  baseUrl: string;
  apiKey: string;
  flow?: UploadFlow;
  preflightLimits?: boolean;
  controlPlaneTimeoutMs?: number;
  transferTimeoutMs?: number;
  fetchImpl?: FetchLike;
  ffprobe?: FfprobeRunner;
  onStateChange?: (change: StateChange) => void;
}

export function createUploader(options: UploaderOptions): UploadOrchestrator {
  const controlPlaneTimeoutMs = options.controlPlaneTimeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS;
  const client = new ControlPlaneClient({
    baseUrl: options.baseUrl,
    apiKey: options.apiKey,
    timeoutMs: controlPlaneTimeoutMs,
    fetchImpl: options.fetchImpl,
  });

  return new UploadOrchestrator({
    probe: new MetadataProbe(options.ffprobe),
    negotiator: createUploadNegotiator(options.flow ?? 'legacy', client, {
      timeoutMs: controlPlaneTimeoutMs,
      preflightLimits: options.preflightLimits,
    }),
    executor: new TransferExecutor({
      timeoutMs: options.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS,
      fetchImpl: options.fetchImpl,
    }),
    finalizer: new UploadFinalizer(client, controlPlaneTimeoutMs),
    onStateChange: options.onStateChange,
  });
}

/**
 * Upload a local video and report a single outcome
 */
export async function uploadVideo(request: UploadRequest, options: UploaderOptions): Promise<UploadOutcome> {
  return createUploader(options).upload(request);
}

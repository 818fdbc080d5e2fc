import { createReadStream, openAsBlob } from 'fs';
import { ResumableTarget, SignedFormTarget, UploadTarget, VideoMetadata } from '../types';
import { DEFAULT_TRANSFER_TIMEOUT_MS } from './api-config';
import { FetchLike } from './control-plane-client';
import { log } from './debug';
import { PolicyRejectedError, TransportFailureError } from './upload-errors';

export const SIGNED_FORM_FILE_FIELD = 'file';
export const RESUMABLE_SESSION_HEADER = 'x-goog-resumable';
export const RESUMABLE_SUCCESS_STATUSES: readonly number[] = [200, 201, 204];

export interface TransferSource {
  filePath: string;
  metadata: VideoMetadata;
}

export interface TransferExecutorOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Moves file bytes to the storage endpoint. The mechanism is chosen from the
 * target's method tag alone; response bodies are only kept for diagnostics.
 */
export class TransferExecutor {
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: TransferExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async transfer(target: UploadTarget, source: TransferSource): Promise<void> {
    const sizeMB = (source.metadata.fileSize / 1024 / 1024).toFixed(2);
    log(`Transferring ${source.metadata.filename} (${sizeMB} MB) via ${target.method}`);

    switch (target.method) {
      case 'signed-form':
        return this.signedFormUpload(target, source);
      case 'resumable-post':
        return this.resumableUpload(target, source, 'POST');
      case 'resumable-put':
        return this.resumableUpload(target, source, 'PUT');
      default: {
        const unknownTarget: never = target;
        throw new TransportFailureError(`Unsupported transfer method: ${JSON.stringify(unknownTarget)}`, 'transfer');
      }
    }
  }

  /**
   * Signed form POST. Signed fields go first, in order, and the file is the
   * last part; storage answers 204 on success and 400 on a policy violation.
   */
  private async signedFormUpload(target: SignedFormTarget, source: TransferSource): Promise<void> {
    const form = new FormData();
    for (const [name, value] of target.fields) {
      form.append(name, value);
    }

    let file: Blob;
    try {
      file = await openAsBlob(source.filePath, { type: source.metadata.contentType });
    } catch (error) {
      throw new TransportFailureError(`Cannot open ${source.filePath} for upload`, 'transfer', { cause: error });
    }
    form.append(SIGNED_FORM_FILE_FIELD, file, source.metadata.filename);

    const response = await this.send(target.uploadUrl, { method: 'POST', body: form });

    if (response.status === 204) {
      log('Upload successful (204 No Content)');
      return;
    }
    if (response.status === 400) {
      throw new PolicyRejectedError(
        'File rejected by storage policy (exceeds 5GB size limit)',
        response.status,
        response.body
      );
    }
    throw new TransportFailureError(`Upload failed: HTTP ${response.status}`, 'transfer', {
      status: response.status,
      body: response.body,
    });
  }

  /**
   * Streamed body with a declared length, opened as a resumable session.
   */
  private async resumableUpload(
    target: ResumableTarget,
    source: TransferSource,
    method: 'POST' | 'PUT'
  ): Promise<void> {
    const stream = createReadStream(source.filePath);
    let response: { status: number; body: string };
    try {
      response = await this.send(target.uploadUrl, {
        method,
        headers: {
          'Content-Type': source.metadata.contentType,
          'Content-Length': String(source.metadata.fileSize),
          [RESUMABLE_SESSION_HEADER]: 'start',
        },
        body: stream,
        duplex: 'half',
      });
    } finally {
      stream.destroy();
    }

    if (RESUMABLE_SUCCESS_STATUSES.includes(response.status)) {
      log(`Upload successful (${response.status})`);
      return;
    }
    throw new TransportFailureError(`Upload failed: HTTP ${response.status}`, 'transfer', {
      status: response.status,
      body: response.body,
    });
  }

  private async send(url: string, init: RequestInit): Promise<{ status: number; body: string }> {
    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportFailureError(`Upload failed: ${message}`, 'transfer', { cause: error });
    }
  }
}

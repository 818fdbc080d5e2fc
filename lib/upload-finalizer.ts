import { ControlPlaneClient, ControlPlaneResponse, detailOf } from './control-plane-client';
import { log } from './debug';
import { DurationExceededError, SizeExceededError, TransportFailureError } from './upload-errors';
import { classifyLimitDetail } from './upload-limits';

export const FINALIZE_UPLOAD_PATH = '/videos/finalize_upload';

/**
 * Commits an uploaded object. The server re-checks size and duration against
 * the bytes it actually received; this client keeps no state between calls.
 */
export class UploadFinalizer {
  constructor(private client: ControlPlaneClient, private timeoutMs?: number) {}

  async finalize(videoId: string): Promise<void> {
    let response: ControlPlaneResponse;
    try {
      response = await this.client.postJson(FINALIZE_UPLOAD_PATH, { video_id: videoId }, this.timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportFailureError(`Finalization failed: ${message}`, 'finalize', { cause: error });
    }

    if (response.status === 200) {
      log(`Finalized ${videoId}`);
      return;
    }

    if (response.status === 413) {
      const detail = detailOf(response.body, 'Limit exceeded');
      if (classifyLimitDetail(detail) === 'duration') {
        throw new DurationExceededError(detail, response.status, response.body);
      }
      throw new SizeExceededError(detail, response.status, response.body);
    }

    throw new TransportFailureError(`Finalization failed: HTTP ${response.status}`, 'finalize', {
      status: response.status,
      body: response.body,
    });
  }
}

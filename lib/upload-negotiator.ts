import { z } from 'zod';
import { SignedFormField, UploadFlow, UploadTarget, VideoMetadata } from '../types';
import { ControlPlaneClient, ControlPlaneResponse, detailOf, parseJsonBody } from './control-plane-client';
import { log } from './debug';
import {
  InvalidMetadataError,
  LimitExceededError,
  TransportFailureError,
} from './upload-errors';
import { classifyLimitDetail, findExceededLimit, MAX_DURATION_MINUTES } from './upload-limits';

export const GET_UPLOAD_URL_PATH = '/videos/get_upload_url';

const signedFieldsSchema = z.record(z.union([z.string(), z.number()]).transform(String));

const legacyResponseSchema = z.object({
  video_id: z.string().min(1),
  upload_url: z.string().min(1),
  fields: signedFieldsSchema,
});

const upfrontResponseSchema = z.object({
  video_id: z.string().min(1),
  upload_url: z.string().min(1),
  method: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['POST', 'PUT'])),
  fields: signedFieldsSchema.optional(),
});

export interface UploadNegotiator {
  readonly flow: UploadFlow;
  negotiate(metadata: VideoMetadata): Promise<UploadTarget>;
}

function toFieldList(fields: Record<string, string>): SignedFormField[] {
  return Object.entries(fields).map(([name, value]) => [name, value] as const);
}

/**
 * Shared request/response handling for both flows. Subclasses decide the
 * payload, which statuses are validation rejections, and how a valid body
 * maps onto a target.
 */
abstract class BaseUploadNegotiator implements UploadNegotiator {
  abstract readonly flow: UploadFlow;

  constructor(protected client: ControlPlaneClient, protected timeoutMs?: number) {}

  async negotiate(metadata: VideoMetadata): Promise<UploadTarget> {
    this.preflight(metadata);

    let response: ControlPlaneResponse;
    try {
      response = await this.client.postJson(GET_UPLOAD_URL_PATH, this.buildPayload(metadata), this.timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportFailureError(`Failed to get upload URL: ${message}`, 'negotiate', { cause: error });
    }

    if (!response.ok) {
      this.rejectOnStatus(response);
      throw new TransportFailureError(
        `Failed to get upload URL: HTTP ${response.status}`,
        'negotiate',
        { status: response.status, body: response.body }
      );
    }

    const target = this.toTarget(parseJsonBody(response.body), response);
    log(`Negotiated ${this.flow} upload: video_id=${target.videoId}, method=${target.method}`);
    return target;
  }

  protected preflight(_metadata: VideoMetadata): void {}

  protected rejectOnStatus(response: ControlPlaneResponse): void {
    if (response.status === 400) {
      throw new InvalidMetadataError(
        detailOf(response.body, 'Invalid metadata'),
        response.status,
        response.body
      );
    }
  }

  protected unexpectedResponse(response: ControlPlaneResponse, issues: string): TransportFailureError {
    return new TransportFailureError(
      `Unexpected response from get_upload_url: ${issues}`,
      'negotiate',
      { status: response.status, body: response.body }
    );
  }

  protected abstract buildPayload(metadata: VideoMetadata): Record<string, string | number>;

  protected abstract toTarget(body: unknown, response: ControlPlaneResponse): UploadTarget;
}

/**
 * Post-hoc validation: the server signs a form policy and checks size and
 * duration only at finalize time.
 */
export class LegacyUploadNegotiator extends BaseUploadNegotiator {
  readonly flow = 'legacy' as const;

  protected buildPayload(metadata: VideoMetadata): Record<string, string | number> {
    return { filename: metadata.filename, content_type: metadata.contentType };
  }

  protected toTarget(body: unknown, response: ControlPlaneResponse): UploadTarget {
    const parsed = legacyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.unexpectedResponse(response, parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', '));
    }

    return {
      method: 'signed-form',
      videoId: parsed.data.video_id,
      uploadUrl: parsed.data.upload_url,
      fields: toFieldList(parsed.data.fields),
    };
  }
}

export interface UpfrontNegotiatorOptions {
  timeoutMs?: number;
  /** Reject limit violations locally, before contacting the control plane. Defaults to true. */
  preflightLimits?: boolean;
}

/**
 * Pre-validation: full metadata is sent and the server rejects limit
 * violations before any bytes move.
 */
export class UpfrontUploadNegotiator extends BaseUploadNegotiator {
  readonly flow = 'upfront' as const;
  private preflightLimits: boolean;

  constructor(client: ControlPlaneClient, options: UpfrontNegotiatorOptions = {}) {
    super(client, options.timeoutMs);
    this.preflightLimits = options.preflightLimits ?? true;
  }

  protected preflight(metadata: VideoMetadata): void {
    if (!this.preflightLimits) return;
    const limit = findExceededLimit(metadata);
    if (limit === 'duration') {
      throw new LimitExceededError(`Video duration exceeds ${MAX_DURATION_MINUTES} minute limit`, limit);
    }
    if (limit === 'size') {
      throw new LimitExceededError('Video file size exceeds 5GB limit', limit);
    }
  }

  protected buildPayload(metadata: VideoMetadata): Record<string, string | number> {
    return {
      filename: metadata.filename,
      content_type: metadata.contentType,
      file_size: metadata.fileSize,
      width: metadata.width,
      height: metadata.height,
      duration_ms: metadata.durationMs,
    };
  }

  protected rejectOnStatus(response: ControlPlaneResponse): void {
    if (response.status === 413) {
      const detail = detailOf(response.body, 'Limit exceeded');
      throw new LimitExceededError(detail, classifyLimitDetail(detail), response.status, response.body);
    }
    super.rejectOnStatus(response);
  }

  protected toTarget(body: unknown, response: ControlPlaneResponse): UploadTarget {
    const parsed = upfrontResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.unexpectedResponse(response, parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', '));
    }

    const { video_id: videoId, upload_url: uploadUrl, method, fields } = parsed.data;
    if (fields) {
      return { method: 'signed-form', videoId, uploadUrl, fields: toFieldList(fields) };
    }
    return { method: method === 'PUT' ? 'resumable-put' : 'resumable-post', videoId, uploadUrl };
  }
}

export function createUploadNegotiator(
  flow: UploadFlow,
  client: ControlPlaneClient,
  options: UpfrontNegotiatorOptions = {}
): UploadNegotiator {
  switch (flow) {
    case 'legacy':
      return new LegacyUploadNegotiator(client, options.timeoutMs);
    case 'upfront':
      return new UpfrontUploadNegotiator(client, options);
  }
}

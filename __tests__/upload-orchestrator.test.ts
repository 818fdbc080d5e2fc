import fs from 'fs';
import os from 'os';
import path from 'path';
import { ControlPlaneClient } from '../lib/control-plane-client';
import { UploadFinalizer } from '../lib/upload-finalizer';
import { LegacyUploadNegotiator } from '../lib/upload-negotiator';
import { createUploader, StateChange, UploadOrchestrator } from '../lib/upload-orchestrator';
import { TransferExecutor } from '../lib/transfer-executor';
import { UploadRequest, VideoMetadata } from '../types';
import { emptyResponse, FakePlatform, jsonResponse } from './helpers/fake-platform';

const BASE_URL = 'https://api.test';
const NEGOTIATE_URL = `${BASE_URL}/videos/get_upload_url`;
const FINALIZE_URL = `${BASE_URL}/videos/finalize_upload`;
const STORE_URL = 'https://store/x';

const PROBE_OUTPUT = JSON.stringify({
  streams: [{ codec_type: 'video', width: 1280, height: 720 }],
  format: { duration: '30' },
});

describe('upload orchestration', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-'));
    filePath = path.join(tmpDir, 'clip.mp4');
    fs.writeFileSync(filePath, Buffer.alloc(4096, 3));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function uploaderFor(
    platform: FakePlatform,
    flow: 'legacy' | 'upfront',
    changes: StateChange[] = [],
    preflightLimits?: boolean
  ) {
    return createUploader({
      baseUrl: BASE_URL,
      apiKey: 'mk_test-key',
      flow,
      preflightLimits,
      fetchImpl: platform.fetch,
      ffprobe: async () => PROBE_OUTPUT,
      onStateChange: (change) => changes.push(change),
    });
  }

  it('should complete an upfront upload through a resumable POST', async () => {
    const platform = new FakePlatform()
      .on('POST', NEGOTIATE_URL, jsonResponse(200, { video_id: 'v1', upload_url: STORE_URL, method: 'POST' }))
      .on('POST', STORE_URL, emptyResponse(201))
      .on('POST', FINALIZE_URL, jsonResponse(200, {}));
    const changes: StateChange[] = [];

    const outcome = await uploaderFor(platform, 'upfront', changes).upload({ filePath });

    expect(outcome).toEqual({ type: 'success', videoId: 'v1' });
    expect(changes.map((c) => c.state)).toEqual(['idle', 'probed', 'negotiated', 'transferred', 'finalized']);
    expect(platform.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `POST ${NEGOTIATE_URL}`,
      `POST ${STORE_URL}`,
      `POST ${FINALIZE_URL}`,
    ]);
    expect(platform.jsonBodyOf(platform.calls[0])).toEqual({
      filename: 'clip.mp4',
      content_type: 'video/mp4',
      file_size: 4096,
      width: 1280,
      height: 720,
      duration_ms: 30000,
    });
    expect(platform.jsonBodyOf(platform.calls[2])).toEqual({ video_id: 'v1' });
  });

  it('should stop at the storage policy for an oversized legacy upload', async () => {
    const platform = new FakePlatform()
      .on(
        'POST',
        NEGOTIATE_URL,
        jsonResponse(200, { video_id: 'v2', upload_url: STORE_URL, fields: { key: 'uploads/v2', policy: 'p' } })
      )
      .on('POST', STORE_URL, new Response('EntityTooLarge', { status: 400 }))
      .on('POST', FINALIZE_URL, jsonResponse(200, {}));
    const oversized: VideoMetadata = {
      filename: 'clip.mp4',
      width: 1920,
      height: 1080,
      durationMs: 600000,
      fileSize: 6 * 1024 ** 3,
      contentType: 'video/mp4',
    };
    const client = new ControlPlaneClient({ baseUrl: BASE_URL, apiKey: 'mk_test-key', fetchImpl: platform.fetch });
    const orchestrator = new UploadOrchestrator({
      probe: { probe: async () => oversized },
      negotiator: new LegacyUploadNegotiator(client),
      executor: new TransferExecutor({ fetchImpl: platform.fetch }),
      finalizer: new UploadFinalizer(client),
    });

    const outcome = await orchestrator.upload({ filePath });

    expect(outcome).toMatchObject({ type: 'rejected', stage: 'transfer', kind: 'PolicyRejected', videoId: 'v2' });
    expect(platform.callsTo(FINALIZE_URL)).toHaveLength(0);
  });

  it('should reject an over-long upfront upload locally by default', async () => {
    const platform = new FakePlatform()
      .on('POST', NEGOTIATE_URL, jsonResponse(200, { video_id: 'v5', upload_url: STORE_URL, method: 'POST' }))
      .on('POST', STORE_URL, emptyResponse(201))
      .on('POST', FINALIZE_URL, jsonResponse(200, {}));
    const changes: StateChange[] = [];

    const outcome = await uploaderFor(platform, 'upfront', changes).upload({
      filePath,
      metadata: { width: 1920, height: 1080, durationMs: 100 * 60 * 1000 },
    });

    expect(outcome).toEqual({
      type: 'rejected',
      stage: 'negotiate',
      kind: 'LimitExceeded',
      reason: 'Video duration exceeds 90 minute limit',
      limit: 'duration',
      status: undefined,
      videoId: undefined,
    });
    expect(platform.calls).toHaveLength(0);
    expect(changes.map((c) => c.state)).toEqual(['idle', 'probed', 'failed']);
  });

  it('should reject an over-long upfront upload at the server before any bytes move', async () => {
    const platform = new FakePlatform()
      .on('POST', NEGOTIATE_URL, jsonResponse(413, { detail: 'duration exceeds maximum' }))
      .on('POST', STORE_URL, emptyResponse(201))
      .on('POST', FINALIZE_URL, jsonResponse(200, {}));
    const request: UploadRequest = {
      filePath,
      metadata: { width: 1920, height: 1080, durationMs: 100 * 60 * 1000 },
    };

    const outcome = await uploaderFor(platform, 'upfront', [], false).upload(request);

    expect(outcome).toEqual({
      type: 'rejected',
      stage: 'negotiate',
      kind: 'LimitExceeded',
      reason: 'duration exceeds maximum',
      limit: 'duration',
      status: 413,
      videoId: undefined,
    });
    expect(platform.calls).toHaveLength(1);
  });

  it('should let the legacy flow discover a duration violation only at finalize', async () => {
    const platform = new FakePlatform()
      .on('POST', NEGOTIATE_URL, jsonResponse(200, { video_id: 'v3', upload_url: STORE_URL, fields: {} }))
      .on('POST', STORE_URL, emptyResponse(204))
      .on('POST', FINALIZE_URL, jsonResponse(413, { detail: 'Video duration exceeds 90 minute limit' }));
    const changes: StateChange[] = [];

    const outcome = await uploaderFor(platform, 'legacy', changes).upload({
      filePath,
      metadata: { width: 1920, height: 1080, durationMs: 100 * 60 * 1000 },
    });

    expect(outcome).toMatchObject({ type: 'rejected', stage: 'finalize', kind: 'DurationExceeded', videoId: 'v3' });
    expect(platform.callsTo(STORE_URL)).toHaveLength(1);
    expect(changes.map((c) => c.state)).toEqual(['idle', 'probed', 'negotiated', 'transferred', 'failed']);
  });

  it('should report metadata read failures without touching the network', async () => {
    const platform = new FakePlatform();
    const changes: StateChange[] = [];

    const outcome = await uploaderFor(platform, 'upfront', changes).upload({ filePath: path.join(tmpDir, 'nope.mp4') });

    expect(outcome).toMatchObject({ type: 'rejected', stage: 'probe', kind: 'ProbeError' });
    expect(platform.calls).toHaveLength(0);
    expect(changes[changes.length - 1]).toMatchObject({ state: 'failed', stage: 'probe' });
  });

  it('should report a transfer transport failure with the video id', async () => {
    const platform = new FakePlatform()
      .on('POST', NEGOTIATE_URL, jsonResponse(200, { video_id: 'v4', upload_url: STORE_URL, method: 'PUT' }))
      .fail('PUT', STORE_URL, 'other side closed')
      .on('POST', FINALIZE_URL, jsonResponse(200, {}));

    const outcome = await uploaderFor(platform, 'upfront').upload({ filePath });

    expect(outcome).toEqual({
      type: 'transport-failure',
      stage: 'transfer',
      kind: 'TransferTransportFailure',
      status: undefined,
      body: '',
      detail: 'Upload failed: other side closed',
      videoId: 'v4',
    });
    expect(platform.callsTo(FINALIZE_URL)).toHaveLength(0);
  });

  it('should use the legacy flow by default', () => {
    const uploader = createUploader({ baseUrl: BASE_URL, apiKey: 'mk_test-key', fetchImpl: new FakePlatform().fetch });

    expect(uploader.flow).toBe('legacy');
  });
});

import fs, { ReadStream } from 'fs';
import http, { IncomingHttpHeaders, Server } from 'http';
import { AddressInfo } from 'net';
import os from 'os';
import path from 'path';
import { PolicyRejectedError, TransportFailureError } from '../lib/upload-errors';
import { TransferExecutor, TransferSource } from '../lib/transfer-executor';
import { ResumableTarget, SignedFormTarget } from '../types';
import { emptyResponse, FakePlatform, jsonResponse } from './helpers/fake-platform';

const STORAGE_URL = 'https://storage.test/bucket';

describe('TransferExecutor', () => {
  let tmpDir: string;
  let source: TransferSource;

  const signedForm: SignedFormTarget = {
    method: 'signed-form',
    videoId: 'vid_1',
    uploadUrl: STORAGE_URL,
    fields: [
      ['key', 'uploads/vid_1/clip.mp4'],
      ['policy', 'test-policy'],
      ['x-goog-signature', 'test-signature'],
    ],
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'transfer-'));
    const filePath = path.join(tmpDir, 'clip.mp4');
    fs.writeFileSync(filePath, Buffer.alloc(2048, 7));
    source = {
      filePath,
      metadata: {
        filename: 'clip.mp4',
        width: 1920,
        height: 1080,
        durationMs: 12500,
        fileSize: 2048,
        contentType: 'video/mp4',
      },
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('signed form', () => {
    it('should send signed fields in order with the file last', async () => {
      const platform = new FakePlatform().on('POST', STORAGE_URL, emptyResponse(204));

      await new TransferExecutor({ fetchImpl: platform.fetch }).transfer(signedForm, source);

      const body = platform.calls[0].body;
      expect(body).toBeInstanceOf(FormData);
      if (!(body instanceof FormData)) return;
      expect(Array.from(body.keys())).toEqual(['key', 'policy', 'x-goog-signature', 'file']);
      expect(body.get('policy')).toBe('test-policy');

      const file = body.get('file');
      expect(typeof file).not.toBe('string');
      if (file === null || typeof file === 'string') return;
      expect(file.name).toBe('clip.mp4');
      expect(file.size).toBe(2048);
      expect(file.type).toBe('video/mp4');
    });

    it('should map 400 to a policy rejection', async () => {
      const platform = new FakePlatform().on('POST', STORAGE_URL, new Response('<Error>EntityTooLarge</Error>', { status: 400 }));

      const error = await new TransferExecutor({ fetchImpl: platform.fetch })
        .transfer(signedForm, source)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PolicyRejectedError);
      expect(error).toMatchObject({
        kind: 'PolicyRejected',
        status: 400,
        message: 'File rejected by storage policy (exceeds 5GB size limit)',
      });
    });

    it('should treat 200 as a transport failure', async () => {
      const platform = new FakePlatform().on('POST', STORAGE_URL, jsonResponse(200, {}));

      const error = await new TransferExecutor({ fetchImpl: platform.fetch })
        .transfer(signedForm, source)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({ kind: 'TransferTransportFailure', status: 200, message: 'Upload failed: HTTP 200' });
    });
  });

  describe('resumable', () => {
    const cases: Array<{ method: ResumableTarget['method']; httpMethod: string }> = [
      { method: 'resumable-post', httpMethod: 'POST' },
      { method: 'resumable-put', httpMethod: 'PUT' },
    ];

    for (const { method, httpMethod } of cases) {
      it(`should stream the file for ${method}`, async () => {
        const platform = new FakePlatform().on(httpMethod, STORAGE_URL, emptyResponse(201));

        await new TransferExecutor({ fetchImpl: platform.fetch }).transfer(
          { method, videoId: 'vid_2', uploadUrl: STORAGE_URL },
          source
        );

        const [call] = platform.calls;
        expect(call.method).toBe(httpMethod);
        expect(call.body).toBeInstanceOf(ReadStream);
        expect(call.headers.get('content-type')).toBe('video/mp4');
        expect(call.headers.get('content-length')).toBe('2048');
        expect(call.headers.get('x-goog-resumable')).toBe('start');
      });
    }

    it('should never send a form body', async () => {
      const platform = new FakePlatform().on('PUT', STORAGE_URL, emptyResponse(200));

      await new TransferExecutor({ fetchImpl: platform.fetch }).transfer(
        { method: 'resumable-put', videoId: 'vid_3', uploadUrl: STORAGE_URL },
        source
      );

      expect(platform.calls[0].body).not.toBeInstanceOf(FormData);
    });

    it('should treat other statuses as transport failures', async () => {
      const platform = new FakePlatform().on('PUT', STORAGE_URL, new Response('resume later', { status: 308 }));

      const error = await new TransferExecutor({ fetchImpl: platform.fetch })
        .transfer({ method: 'resumable-put', videoId: 'vid_4', uploadUrl: STORAGE_URL }, source)
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ kind: 'TransferTransportFailure', status: 308, body: 'resume later' });
    });
  });

  describe('over a real connection', () => {
    let server: Server;
    let received: { method?: string; headers: IncomingHttpHeaders; body: Buffer };

    async function startStorage(status: number): Promise<string> {
      server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
          received = { method: req.method, headers: req.headers, body: Buffer.concat(chunks) };
          res.statusCode = status;
          res.end();
        });
      });
      return new Promise((resolve, reject) => {
        server.listen(0, '127.0.0.1', () => {
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Server has no TCP address'));
            return;
          }
          const { port }: AddressInfo = address;
          resolve(`http://127.0.0.1:${port}/bucket`);
        });
      });
    }

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    });

    it('should send the declared length without chunked encoding', async () => {
      const uploadUrl = await startStorage(201);

      await new TransferExecutor().transfer({ method: 'resumable-put', videoId: 'vid_5', uploadUrl }, source);

      expect(received.method).toBe('PUT');
      expect(received.headers['content-length']).toBe('2048');
      expect(received.headers['transfer-encoding']).toBeUndefined();
      expect(received.headers['x-goog-resumable']).toBe('start');
      expect(received.headers['content-type']).toBe('video/mp4');
      expect(received.body.equals(Buffer.alloc(2048, 7))).toBe(true);
    });

    it('should encode signed fields before the file part', async () => {
      const uploadUrl = await startStorage(204);

      await new TransferExecutor().transfer({ ...signedForm, uploadUrl }, source);

      const body = received.body.toString('latin1');
      const key = body.indexOf('name="key"');
      const policy = body.indexOf('name="policy"');
      const file = body.indexOf('name="file"; filename="clip.mp4"');
      expect(received.headers['content-type']).toMatch(/^multipart\/form-data; boundary=/);
      expect(key).toBeGreaterThan(-1);
      expect(policy).toBeGreaterThan(key);
      expect(file).toBeGreaterThan(policy);
    });
  });

  it('should wrap network errors', async () => {
    const platform = new FakePlatform().fail('POST', STORAGE_URL, 'connect ECONNREFUSED');

    await expect(new TransferExecutor({ fetchImpl: platform.fetch }).transfer(signedForm, source)).rejects.toThrow(
      'Upload failed: connect ECONNREFUSED'
    );
  });
});

#!/usr/bin/env tsx

/**
 * Upload a video file in three steps:
 *   1) POST /videos/get_upload_url
 *   2) transfer the bytes to the storage URL it returns
 *   3) POST /videos/finalize_upload
 *
 * Usage:
 *   npm run upload -- --file ./video.mp4 [--content-type video/mp4] [--flow upfront] [--skip-preflight]
 *
 * The upfront flow checks the 90 minute and 5GB limits locally unless
 * --skip-preflight is given.
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { ClientConfigLoader, parseUploadFlow } from '../lib/api-config';
import { setDebugMode } from '../lib/debug';
import { UploadErrorHandler } from '../lib/upload-errors';
import { createUploader, StateChange } from '../lib/upload-orchestrator';
import { MetadataOverride } from '../types';

function parseOptionalInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`--${name} must be a non-negative integer`);
  }
  return parsed;
}

function printStep(change: StateChange): void {
  switch (change.state) {
    case 'idle':
      console.log('\n🔍 Step 0: Reading video metadata...');
      break;
    case 'probed':
      if (change.metadata) {
        const { width, height, durationMs, fileSize, contentType } = change.metadata;
        console.log(`   File size: ${(fileSize / (1024 * 1024)).toFixed(2)} MB`);
        console.log(`   ${width}x${height}, ${(durationMs / 1000).toFixed(1)}s, ${contentType}`);
      }
      console.log('\n📤 Step 1: Getting upload URL...');
      break;
    case 'negotiated':
      if (change.target) {
        console.log(`   ✅ Got video_id: ${change.target.videoId}`);
        console.log(`   Method: ${change.target.method}`);
      }
      console.log('\n⬆️  Step 2: Uploading...');
      break;
    case 'transferred':
      console.log('   ✅ Upload successful');
      console.log('\n✅ Step 3: Finalizing upload...');
      break;
    case 'finalized':
      console.log('   ✅ Finalization complete');
      break;
    case 'failed':
      break;
  }
}

async function main() {
  const { values } = parseArgs({
    options: {
      file: { type: 'string' },
      'content-type': { type: 'string' },
      'api-key': { type: 'string' },
      'base-url': { type: 'string' },
      flow: { type: 'string' },
      width: { type: 'string' },
      height: { type: 'string' },
      'duration-ms': { type: 'string' },
      'skip-preflight': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
    },
  });

  if (!values.file) {
    console.error('❌ --file is required');
    process.exit(1);
  }

  setDebugMode(values.verbose ?? false);

  try {
    const config = ClientConfigLoader.loadConfig();
    const apiKey = ClientConfigLoader.resolveApiKey(values['api-key']);
    const metadata: MetadataOverride = {
      width: parseOptionalInt('width', values.width),
      height: parseOptionalInt('height', values.height),
      durationMs: parseOptionalInt('duration-ms', values['duration-ms']),
    };

    const uploader = createUploader({
      baseUrl: values['base-url'] || config.baseUrl,
      apiKey,
      flow: values.flow ? parseUploadFlow(values.flow) : config.uploadFlow,
      preflightLimits: !values['skip-preflight'],
      controlPlaneTimeoutMs: config.controlPlaneTimeoutMs,
      transferTimeoutMs: config.transferTimeoutMs,
      onStateChange: printStep,
    });

    const outcome = await uploader.upload({
      filePath: values.file,
      contentType: values['content-type'],
      metadata,
    });

    if (outcome.type === 'success') {
      console.log('\n🎉 Upload complete!');
      console.log(`   Video ID: ${outcome.videoId}`);
      return;
    }

    console.error(`\n❌ Upload failed during ${outcome.stage}: ${UploadErrorHandler.getUserMessage(outcome)}`);
    if (outcome.type === 'transport-failure' && outcome.body) {
      console.error(`   Response: ${outcome.body}`);
    }
    if (UploadErrorHandler.isRetryable(outcome)) {
      console.error('   This looks transient; re-running the upload may succeed.');
    }
    process.exit(1);
  } catch (error) {
    console.error(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

export { main as uploadVideoCli };

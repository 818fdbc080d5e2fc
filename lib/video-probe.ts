import { spawn } from 'child_process';
import fs, { FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { MetadataOverride, UploadRequest, VideoMetadata } from '../types';
import { log } from './debug';
import { resolveContentType } from './mime';
import { ProbeError } from './upload-errors';

export type FfprobeRunner = (filePath: string) => Promise<string>;

const ffprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        duration: z.string().optional(),
      })
    )
    .default([]),
  format: z.object({ duration: z.string().optional() }).optional(),
});

/** The ffprobe executable could not be started */
export class FfprobeMissingError extends Error {
  constructor(public readonly command: string, cause?: unknown) {
    super(`${command} not found`, { cause });
    this.name = 'FfprobeMissingError';
  }
}

/**
 * Build a runner that invokes the given ffprobe executable and returns its
 * JSON report
 */
export function createFfprobeRunner(command = 'ffprobe'): FfprobeRunner {
  return (filePath) =>
    new Promise<string>((resolve, reject) => {
      const ffprobe = spawn(command, [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        filePath
      ]);

      let output = '';
      ffprobe.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });

      ffprobe.on('close', (code) => {
        if (code === 0) {
          resolve(output);
        } else {
          reject(new Error(`ffprobe exited with code ${code}`));
        }
      });

      ffprobe.on('error', (error) => {
        if ('code' in error && error.code === 'ENOENT') {
          reject(new FfprobeMissingError(command, error));
          return;
        }
        reject(error);
      });
    });
}

export const runFfprobe: FfprobeRunner = createFfprobeRunner();

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function hasCompleteOverride(
  override: MetadataOverride | undefined
): override is Required<MetadataOverride> {
  return (
    override !== undefined &&
    override.width !== undefined &&
    override.height !== undefined &&
    override.durationMs !== undefined
  );
}

export class MetadataProbe {
  private runner: FfprobeRunner;

  constructor(runner: FfprobeRunner = runFfprobe) {
    this.runner = runner;
  }

  /**
   * Inspect a local file. No network I/O happens here.
   */
  async probe(request: UploadRequest): Promise<VideoMetadata> {
    const fileSize = await this.readFileSize(request.filePath);
    this.validateOverride(request.metadata);

    const dimensions = hasCompleteOverride(request.metadata)
      ? request.metadata
      : { ...(await this.readVideoInfo(request.filePath)), ...this.definedFields(request.metadata) };

    const metadata: VideoMetadata = {
      filename: path.basename(request.filePath),
      width: dimensions.width,
      height: dimensions.height,
      durationMs: dimensions.durationMs,
      fileSize,
      contentType: resolveContentType(request.filePath, request.contentType),
    };

    log(
      `Probed ${metadata.filename}: ${metadata.width}x${metadata.height}, ` +
        `${metadata.durationMs}ms, ${metadata.fileSize} bytes, ${metadata.contentType}`
    );
    return metadata;
  }

  private async readFileSize(filePath: string): Promise<number> {
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, 'r');
    } catch (error) {
      throw new ProbeError(`File not found or unreadable: ${filePath}`, error);
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new ProbeError(`Not a regular file: ${filePath}`);
      }
      return stats.size;
    } finally {
      await handle.close();
    }
  }

  private validateOverride(override: MetadataOverride | undefined): void {
    if (!override) return;
    for (const [field, value] of Object.entries(override)) {
      if (value !== undefined && !isNonNegativeInteger(value)) {
        throw new ProbeError(`Metadata override ${field} must be a non-negative integer, got ${value}`);
      }
    }
  }

  private definedFields(override: MetadataOverride | undefined): MetadataOverride {
    const fields: MetadataOverride = {};
    if (override?.width !== undefined) fields.width = override.width;
    if (override?.height !== undefined) fields.height = override.height;
    if (override?.durationMs !== undefined) fields.durationMs = override.durationMs;
    return fields;
  }

  private async readVideoInfo(
    filePath: string
  ): Promise<{ width: number; height: number; durationMs: number }> {
    let raw: string;
    try {
      raw = await this.runner(filePath);
    } catch (error) {
      if (error instanceof FfprobeMissingError) {
        throw new ProbeError(
          `${error.command} is not installed or not on PATH; pass width, height and duration to skip reading ${path.basename(filePath)}`,
          error
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProbeError(`Cannot decode ${path.basename(filePath)} as a video container: ${message}`, error);
    }

    let info: z.infer<typeof ffprobeOutputSchema>;
    try {
      info = ffprobeOutputSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new ProbeError(`Unreadable probe output for ${path.basename(filePath)}`, error);
    }

    const videoStream = info.streams.find((s) => s.codec_type === 'video');
    if (!videoStream) {
      throw new ProbeError(`No video stream found in ${path.basename(filePath)}`);
    }

    const seconds = parseFloat(info.format?.duration ?? videoStream.duration ?? '');
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new ProbeError(`Cannot determine duration of ${path.basename(filePath)}`);
    }

    return {
      width: Math.max(0, Math.round(videoStream.width ?? 0)),
      height: Math.max(0, Math.round(videoStream.height ?? 0)),
      durationMs: Math.round(seconds * 1000),
    };
  }
}

import { LimitKind, VideoMetadata } from '../types';

export const MAX_DURATION_MINUTES = 90;
export const MAX_DURATION_MS = MAX_DURATION_MINUTES * 60 * 1000;
export const MAX_FILE_SIZE_BYTES = 5 * 1024 * 1024 * 1024;

/**
 * Classify a server rejection detail. Anything that does not mention duration
 * is treated as a size violation.
 */
export function classifyLimitDetail(detail: string): LimitKind {
  return detail.toLowerCase().includes('duration') ? 'duration' : 'size';
}

export function findExceededLimit(metadata: VideoMetadata): LimitKind | null {
  if (metadata.durationMs > MAX_DURATION_MS) return 'duration';
  if (metadata.fileSize > MAX_FILE_SIZE_BYTES) return 'size';
  return null;
}

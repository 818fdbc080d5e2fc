export const GENERIC_CONTENT_TYPE = 'application/octet-stream'

export function getFileExtension(filename: string, fallback = ''): string {
  const m = filename.toLowerCase().match(/\.[^./\\]+$/)
  return m ? m[0] : fallback
}

export function getVideoContentTypeByExt(ext: string): string {
  const contentTypes: Record<string, string> = {
    '.mp4': 'video/mp4',
    '.mov': 'video/quicktime',
    '.avi': 'video/x-msvideo',
    '.mkv': 'video/x-matroska',
    '.webm': 'video/webm',
    '.m4v': 'video/x-m4v'
  }
  return contentTypes[ext.toLowerCase()] || GENERIC_CONTENT_TYPE
}

/**
 * Explicit override first, then the extension table, then a generic binary type.
 */
export function resolveContentType(filePath: string, explicit?: string): string {
  const override = explicit?.trim()
  if (override) return override
  return getVideoContentTypeByExt(getFileExtension(filePath))
}

import * as path from 'path';

export const DEFAULT_MEDIA_EXTENSION = '.mp4';

const MEDIA_EXTENSIONS = new Set(['.mp4', '.m4v', '.mov', '.mkv', '.webm', '.avi', '.m4a', '.mp3', '.wav']);

// Utility to turn a worksheet file name into a safe local file name
export function normalizeFileName(name: string | undefined | null, fallbackStem: string = 'recording'): string {
  const cleaned = (name ?? '')
    .replace(/[/\\]/g, '_') // No directory separators: every file lives directly in the download root
    .replace(/[\u0000-\u001f]/g, '') // Remove control characters
    .trim();

  const base = cleaned === '' ? fallbackStem : cleaned;
  const extension = path.extname(base).toLowerCase();
  return MEDIA_EXTENSIONS.has(extension) ? base : `${base}${DEFAULT_MEDIA_EXTENSION}`;
}

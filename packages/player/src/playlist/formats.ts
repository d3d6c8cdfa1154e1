/**
 * Supported audio formats
 */

import path from 'node:path';

/**
 * Sampled formats plus the tracker module formats (MOD, XM, IT, S3M)
 */
export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3',
  '.ogg',
  '.wav',
  '.flac',
  '.mod',
  '.xm',
  '.it',
  '.s3m',
]);

export function isSupportedAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Display name of a track: its file name
 */
export function trackName(filePath: string): string {
  return path.basename(filePath);
}

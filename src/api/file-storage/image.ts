/**
 * Content-based image detection for uploads.
 *
 * The client's filename and mimetype are ignored; the bytes decide.
 */

import { fileTypeFromBuffer } from 'file-type';
import type { DetectedImage } from './types.ts';

/** Raster formats accepted as recipe images */
export const ACCEPTED_IMAGE_TYPES: ReadonlySet<string> = new Set([
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
  'image/bmp',
  'image/tiff',
]);

/**
 * Sniff the buffer's magic bytes.
 *
 * @returns the detected image type, or null for anything that is not an
 * accepted raster image (including empty input).
 */
export async function detectImage(data: Uint8Array): Promise<DetectedImage | null> {
  if (data.length === 0) return null;
  const type = await fileTypeFromBuffer(data);
  if (!type || !ACCEPTED_IMAGE_TYPES.has(type.mime)) return null;
  return { ext: type.ext, mime: type.mime };
}

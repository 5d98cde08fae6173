import { readFile } from 'node:fs/promises';
import { isAbsolute } from 'node:path';
import { RenderError } from '../errors/index.js';

/**
 * Loads branding assets (logo, font) by absolute path.
 * Resolves null when the asset is missing so the renderer can fall back.
 */
export interface AssetLoader {
  load(path: string): Promise<Buffer | null>;
}

export type ImageFormat = 'png' | 'jpeg';

export class FileAssetLoader implements AssetLoader {
  async load(path: string): Promise<Buffer | null> {
    if (!isAbsolute(path)) return null;
    try {
      return await readFile(path);
    } catch (error) {
      if (isMissing(error)) return null;
      throw new RenderError(`Failed to read asset ${path}`, error);
    }
  }
}

export function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Sniff the image type from magic bytes; file extensions are not trusted. */
export function detectImageFormat(bytes: Buffer): ImageFormat | null {
  if (bytes.length >= 8 && bytes.subarray(0, 8).equals(PNG_SIGNATURE)) return 'png';
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return 'jpeg';
  return null;
}

/** TrueType, OpenType/CFF and TrueType collections. */
export function isFontFile(bytes: Buffer): boolean {
  if (bytes.length < 4) return false;
  const tag = bytes.subarray(0, 4).toString('latin1');
  return tag === '\u0000\u0001\u0000\u0000' || tag === 'OTTO' || tag === 'true' || tag === 'ttcf';
}

import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join, posix } from 'node:path';
import { ValidationError } from '../types/errors.js';

export type ImageType = 'png' | 'jpg' | 'gif' | 'webp';

const RECIPE_IMAGE_DIR = 'uploads/recipe';

function startsWith(buffer: Buffer, signature: number[], offset = 0): boolean {
  if (buffer.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => buffer[offset + index] === byte);
}

/** Identify an image by its file signature rather than its name or declared type. */
export function detectImageType(buffer: Buffer): ImageType | null {
  if (startsWith(buffer, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'png';
  }
  if (startsWith(buffer, [0xff, 0xd8, 0xff])) {
    return 'jpg';
  }
  if (startsWith(buffer, [0x47, 0x49, 0x46, 0x38])) {
    return 'gif';
  }
  // RIFF....WEBP
  if (startsWith(buffer, [0x52, 0x49, 0x46, 0x46]) && startsWith(buffer, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'webp';
  }
  return null;
}

/**
 * Writes uploaded recipe images under the media root. Stored paths are
 * relative to the root and always use forward slashes.
 */
export class ImageStorage {
  private mediaRoot: string;

  constructor(mediaRoot: string) {
    this.mediaRoot = mediaRoot;
  }

  async save(buffer: Buffer): Promise<string> {
    const type = detectImageType(buffer);
    if (type === null) {
      throw ValidationError.forField(
        'image',
        'Upload a valid image. The file you uploaded was either not an image or a corrupted image.'
      );
    }

    const relativePath = posix.join(RECIPE_IMAGE_DIR, `${randomUUID()}.${type}`);
    const absolutePath = this.resolve(relativePath);
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, buffer);
    return relativePath;
  }

  async remove(relativePath: string): Promise<void> {
    await rm(this.resolve(relativePath), { force: true });
  }

  resolve(relativePath: string): string {
    return join(this.mediaRoot, ...relativePath.split('/'));
  }
}

/**
 * Profile photo storage.
 *
 * Photos are written to a local directory that the server exposes under
 * {@link PHOTO_PUBLIC_PREFIX}; the contact row keeps the public path.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Pool } from 'pg';
import { setContactPhoto } from './service.ts';

export const PHOTO_PUBLIC_PREFIX = '/static/photos/';

/** Accepted content types and the extension stored for each. */
export const PHOTO_CONTENT_TYPES: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

export interface PhotoStorage {
  save(filename: string, data: Buffer): Promise<void>;
  delete(filename: string): Promise<void>;
  exists(filename: string): Promise<boolean>;
}

/**
 * Stores photos as files in one directory, created on first write.
 */
export class LocalPhotoStorage implements PhotoStorage {
  constructor(readonly dir: string) {}

  private resolve(filename: string): string {
    if (filename !== path.basename(filename) || filename.startsWith('.')) {
      throw new Error(`Invalid photo filename: ${filename}`);
    }
    return path.join(this.dir, filename);
  }

  async save(filename: string, data: Buffer): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.resolve(filename), data);
  }

  async delete(filename: string): Promise<void> {
    await rm(this.resolve(filename), { force: true });
  }

  async exists(filename: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(filename));
      return info.isFile();
    } catch {
      return false;
    }
  }
}

export class PhotoTooLargeError extends Error {
  constructor(
    public size_bytes: number,
    public max_size_bytes: number,
  ) {
    super(`Photo size ${size_bytes} bytes exceeds maximum allowed ${max_size_bytes} bytes`);
    this.name = 'PhotoTooLargeError';
  }
}

export class UnsupportedPhotoTypeError extends Error {
  constructor(public content_type: string) {
    super(`Unsupported photo type: ${content_type}. Allowed: ${Object.keys(PHOTO_CONTENT_TYPES).join(', ')}`);
    this.name = 'UnsupportedPhotoTypeError';
  }
}

/** The stored filename behind a public photo path, or null for foreign paths. */
export function photoFilename(publicPath: string): string | null {
  if (!publicPath.startsWith(PHOTO_PUBLIC_PREFIX)) return null;
  const name = publicPath.slice(PHOTO_PUBLIC_PREFIX.length);
  return name && name === path.basename(name) ? name : null;
}

/** Delete the file behind a public photo path; foreign paths are left alone. */
export async function deletePhotoFile(storage: PhotoStorage, publicPath: string | null): Promise<void> {
  if (!publicPath) return;
  const filename = photoFilename(publicPath);
  if (filename) {
    await storage.delete(filename);
  }
}

export interface PhotoUpload {
  content_type: string;
  data: Buffer;
}

/**
 * Saves a photo and points the contact at it, removing the previous file.
 * Returns the new public path, or null when the contact does not exist.
 *
 * @throws UnsupportedPhotoTypeError, PhotoTooLargeError
 */
export async function storeContactPhoto(
  pool: Pool,
  storage: PhotoStorage,
  contactId: string,
  upload: PhotoUpload,
  maxSizeBytes: number,
): Promise<string | null> {
  const extension = PHOTO_CONTENT_TYPES[upload.content_type];
  if (!extension) {
    throw new UnsupportedPhotoTypeError(upload.content_type);
  }
  if (upload.data.length > maxSizeBytes) {
    throw new PhotoTooLargeError(upload.data.length, maxSizeBytes);
  }

  const filename = `${contactId}-${randomUUID()}${extension}`;
  const publicPath = `${PHOTO_PUBLIC_PREFIX}${filename}`;
  await storage.save(filename, upload.data);

  let previous: string | null | undefined;
  try {
    previous = await setContactPhoto(pool, contactId, publicPath);
  } catch (error) {
    await storage.delete(filename);
    throw error;
  }

  if (previous === undefined) {
    await storage.delete(filename);
    return null;
  }

  await deletePhotoFile(storage, previous);
  return publicPath;
}

/**
 * Clears a contact's photo and deletes the file. Returns false when the
 * contact does not exist.
 */
export async function removeContactPhoto(pool: Pool, storage: PhotoStorage, contactId: string): Promise<boolean> {
  const previous = await setContactPhoto(pool, contactId, null);
  if (previous === undefined) return false;
  await deletePhotoFile(storage, previous);
  return true;
}

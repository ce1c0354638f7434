import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';

export const MAX_UPLOAD_SIZE = 10 * 1024 * 1024; // 10MB
export const PHOTO_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

function getUploadRoot(): string {
  return process.env.UPLOAD_DIR ?? path.join(process.cwd(), '..', '..', 'uploads');
}

/**
 * Make an uploaded filename safe to store: basename only, unsafe chars replaced with _.
 */
export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const safe = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return safe || 'upload';
}

/**
 * Get the upload directory for one submission.
 * Creates it if it doesn't exist.
 */
export async function getSubmissionDir(submissionId: string): Promise<string> {
  const dir = path.join(getUploadRoot(), sanitizeFilename(submissionId));
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  return dir;
}

/** Write an uploaded file and return its absolute path. */
export async function saveUpload(dir: string, filename: string, bytes: Uint8Array): Promise<string> {
  const target = path.join(dir, sanitizeFilename(filename));
  await writeFile(target, bytes);
  return target;
}

/** Read a stored photo; null when the file is gone. */
export async function readStoredPhoto(photoPath: string | null): Promise<Uint8Array | null> {
  if (!photoPath || !existsSync(photoPath)) return null;
  return new Uint8Array(await readFile(photoPath));
}

import { mkdir, rm, stat, access } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(path: string): Promise<void> {
  try {
    await access(path);
  } catch {
    await mkdir(path, { recursive: true });
  }
}

/**
 * Ensure the parent directory of a file exists
 */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  await ensureDirectory(dirname(filePath));
}

/**
 * Serialize data to JSON with proper formatting
 */
export function serialize(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Delete a file; a missing file is not an error
 */
export async function deleteFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Size of a file in bytes
 */
export async function fileSize(filePath: string): Promise<number> {
  const info = await stat(filePath);
  return info.size;
}

/**
 * Whether a path currently exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

import { promises as fs } from 'fs';
import path from 'path';

export async function ensureDir(dir: string, mode?: number): Promise<void> {
  await fs.mkdir(dir, { recursive: true, mode });
}

/**
 * Write through a temp file and rename so readers never see a partial file.
 */
export async function atomicWrite(filePath: string, contents: string, mode?: number): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.tmp-${Date.now()}-${process.pid}`);
  await fs.writeFile(tempPath, contents, { encoding: 'utf8', mode });
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Errors raised by Node's fs come from another realm under Jest, so this
 * checks the shape rather than `instanceof Error`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

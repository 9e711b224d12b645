/**
 * Config file I/O
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Config text, or null when there is no file */
export async function readConfigText(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

export async function configFileExists(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}

/**
 * Replace the config file through a sibling temp file and a rename, so
 * readers see either the old or the new text. Creates missing directories
 * and ends the text with a newline.
 */
export async function writeConfigText(path: string, text: string): Promise<void> {
  const dir = dirname(path);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, text.endsWith('\n') ? text : text + '\n', 'utf-8');
    await fs.rename(tmpPath, path);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

import fs from 'node:fs/promises';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch (e) {
    if (isMissing(e)) {
      return false;
    }
    throw e;
  }
}

export async function mkDir(path: string): Promise<string | undefined> {
  return fs.mkdir(path, {recursive: true});
}

/**
 * Read a UTF-8 text file.
 *
 * @param path - The file to read.
 * @returns The content, or undefined if the file does not exist.
 */
export async function readTextFile(path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (e) {
    if (isMissing(e)) {
      return undefined;
    }
    throw e;
  }
}

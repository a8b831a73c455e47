import { promises as fs, constants } from 'fs';
import type { PathLike, WriteFileOptions } from 'fs';
import crypto from 'crypto';
import path from 'path';

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code.toUpperCase();
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export async function pathExists(targetPath: PathLike): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

async function ensureDir(directoryPath: PathLike): Promise<void> {
  await fs.mkdir(directoryPath, { recursive: true });
}

/**
 * Read a UTF-8 file, or `undefined` when it does not exist.
 */
export async function readTextIfExists(filePath: PathLike): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }
}

export async function writeFileAtomic(
  filePath: PathLike,
  data: string | NodeJS.ArrayBufferView,
  options: WriteFileOptions = {}
): Promise<void> {
  const resolvedPath = typeof filePath === 'string' ? filePath : filePath.toString();
  const directory = path.dirname(resolvedPath);
  await ensureDir(directory);

  const uniqueSuffix = `${process.pid}-${Date.now()}-${crypto.randomBytes(6).toString('hex')}`;
  const tempFile = path.join(directory, `.tmp-${path.basename(resolvedPath)}-${uniqueSuffix}`);

  try {
    await fs.writeFile(tempFile, data, options);
    await fs.rename(tempFile, resolvedPath);
  } catch (error) {
    if (errnoCode(error) === 'EXDEV') {
      // Cross-device rename fallback: copy + unlink
      await fs.copyFile(tempFile, resolvedPath, constants.COPYFILE_FICLONE);
      await fs.unlink(tempFile);
    } else {
      await fs.rm(tempFile, { force: true });
      throw error;
    }
  }
}

export async function appendLine(filePath: PathLike, line: string): Promise<void> {
  const resolvedPath = typeof filePath === 'string' ? filePath : filePath.toString();
  await ensureDir(path.dirname(resolvedPath));
  await fs.appendFile(resolvedPath, `${line}\n`, 'utf-8');
}

/**
 * File system access. The extractor and validator take text; only the
 * callers around them read files.
 */
import * as fs from 'node:fs';
import { NotFoundError, SystemError, ErrorCodes } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a source file as UTF-8 text.
 * Missing paths and directories raise NotFoundError keyed by the path as given.
 */
export async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new NotFoundError(filePath, { reason: error.code });
    }
    throw new SystemError(
      ErrorCodes.NOT_FOUND,
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

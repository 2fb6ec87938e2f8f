/**
 * File system helpers that validate paths before touching the disk.
 *
 * All paths are resolved to absolute paths; empty paths and paths containing
 * null bytes are rejected.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Reads a UTF-8 text file after validating its path.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating its path, creating the parent
 * directory when it does not exist.
 */
export async function safeWriteFile(filePath: string, content: string): Promise<void> {
  const resolved = validatePath(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, content, 'utf-8');
}

/**
 * Checks whether a path exists.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(validatePath(filePath));
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronous existence check, used by project context detection.
 */
export function safeExistsSync(filePath: string): boolean {
  return fsSync.existsSync(validatePath(filePath));
}

/**
 * Returns true when the path exists and is a directory.
 */
export function safeIsDirectorySync(filePath: string): boolean {
  try {
    return fsSync.statSync(validatePath(filePath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Synchronously reads a UTF-8 text file after validating its path.
 */
export function safeReadFileSync(filePath: string): string {
  return fsSync.readFileSync(validatePath(filePath), 'utf-8');
}

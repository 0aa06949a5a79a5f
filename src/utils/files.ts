/**
 * @fileoverview File system utilities for reading access logs and writing
 * report files. Provides helpers for directory management, existence checks
 * and text reading.
 *
 * @module utils/files
 */

import fs from 'fs';
import path from 'path';

const { access, readFile, writeFile, mkdir } = fs.promises;

/**
 * Ensures a directory exists, creating it and any parent directories if needed.
 * Equivalent to `mkdir -p` in Unix.
 *
 * @param dirPath - Path to the directory to create
 */
export async function ensureDirExists(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Checks if a file or directory exists at the specified path.
 *
 * @param filepath - Path to check for existence
 * @returns `true` if path exists, `false` otherwise
 */
export async function pathExists(filepath: string): Promise<boolean> {
  try {
    await access(filepath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads a UTF-8 text file.
 *
 * @param filepath - Path to the file to read
 * @returns File contents
 * @throws Error if the file does not exist or cannot be read
 */
export async function readTextFile(filepath: string): Promise<string> {
  if (!(await pathExists(filepath))) {
    throw new Error(`File not found: ${filepath}`);
  }
  return readFile(filepath, 'utf-8');
}

/**
 * Writes a UTF-8 text file, creating its parent directories first.
 *
 * @param filepath - Destination path
 * @param content - Text to write
 */
export async function writeTextFile(filepath: string, content: string): Promise<void> {
  await ensureDirExists(path.dirname(filepath));
  await writeFile(filepath, content, 'utf-8');
}

/**
 * File Service
 *
 * Low-level file system operations with consistent error handling.
 * Provides atomic file operations and directory management.
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import type { z } from 'zod';
import { DbError } from '../errors.js';
import { FILESYSTEM } from '../utils/constants.js';
import { createLogger, LOG_NAMESPACES } from '../utils/index.js';
import { formatZodIssues, isFileSystemError } from '../utils/validation.js';

const logger = createLogger(LOG_NAMESPACES.STORAGE);

/**
 * Handles all file system I/O operations
 */
export class FileService {
  /**
   * Ensure a directory exists, creating it if necessary
   */
  async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      logger.error(`Error creating directory ${dirPath}`, error);
      throw new Error(
        `Failed to create directory: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Write JSON data to a file atomically.
   * The data goes to a temporary file first, which then replaces the target, so readers
   * see either the old or the new document.
   */
  async writeJson<T>(filePath: string, data: T, context: string): Promise<void> {
    await this.ensureDirectory(path.dirname(filePath));
    const tempPath = `${filePath}${FILESYSTEM.TEMP_SUFFIX}`;

    try {
      const json = JSON.stringify(data, null, FILESYSTEM.JSON_INDENT);
      await fs.writeFile(tempPath, json, FILESYSTEM.ENCODING);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      logger.error(`Error while ${context}`, error);
      await this.deleteFile(tempPath);
      throw new Error(
        `Failed while ${context}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Read and validate JSON data from a file
   * Returns null if file doesn't exist
   *
   * @throws {DbError} if the file does not match the schema
   */
  async readJson<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    context: string,
  ): Promise<T | null> {
    let raw: unknown;
    try {
      const data = await fs.readFile(filePath, FILESYSTEM.ENCODING);
      raw = JSON.parse(data);
    } catch (error: unknown) {
      if (isFileSystemError(error) && error.code === 'ENOENT') {
        return null;
      }
      logger.error(`Error while ${context}`, error);
      throw new Error(
        `Failed while ${context}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new DbError(`Failed while ${context}: ${filePath} is invalid (${formatZodIssues(parsed.error)})`);
    }
    return parsed.data;
  }

  /**
   * Delete a file if it exists
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      logger.warn(`Could not delete file ${filePath}`, error);
    }
  }

  /**
   * Recursively collect all files with an extension in a directory, sorted by path.
   * Returns an empty list if the directory doesn't exist.
   */
  async collectFiles(rootDir: string, extension: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(rootDir, { withFileTypes: true });
    } catch (error: unknown) {
      if (isFileSystemError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const results: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(rootDir, entry.name);
      if (entry.isDirectory()) {
        results.push(...(await this.collectFiles(fullPath, extension)));
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        results.push(fullPath);
      }
    }

    return results.sort();
  }
}

/**
 * JSON File Helpers
 *
 * Shared by the file-backed repositories. Writes go through a temporary
 * file in the target directory followed by a rename, so a reader sees
 * either the old document or the new one.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BadRequestError } from '../models/errors';

const SCOPE_PATTERN = /^[a-z0-9_\-+]+(\/[a-z0-9_\-+]+)*$/i;

/**
 * Resolve the directory of a leaderboard lineage under a root directory
 *
 * @throws BadRequestError if the scope contains anything but path-safe segments
 */
export function scopeDirectory(root: string, scope: string): string {
  if (!SCOPE_PATTERN.test(scope)) {
    throw new BadRequestError(`Invalid scope: '${scope}'`);
  }

  return path.join(root, ...scope.split('/'));
}

/**
 * File name of a sequence within a lineage directory
 */
export function sequenceFileName(sequence: number): string {
  return `${sequence}.json`;
}

/**
 * Sequences stored in a lineage directory, ascending
 *
 * A missing directory holds no sequences.
 */
export async function listSequences(directory: string): Promise<number[]> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  return names
    .map((name) => /^(-?\d+)\.json$/.exec(name))
    .flatMap((match) => (match ? [parseInt(match[1], 10)] : []))
    .sort((a, b) => a - b);
}

/**
 * Read and parse a JSON file, undefined if it does not exist
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/**
 * Write a JSON document atomically
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  const directory = path.dirname(filePath);
  await fs.mkdir(directory, { recursive: true });

  const tempPath = path.join(directory, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Delete a JSON document; a missing file is not an error
 */
export async function removeJsonFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

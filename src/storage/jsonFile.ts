/**
 * Whole-document JSON persistence.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PersistenceError, errorMessage } from '../errors';

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * a file that exists but cannot be parsed is an error, never an empty store.
 */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    throw new PersistenceError(`Error reading ${filePath}: ${errorMessage(error)}`, 'read', { filePath });
  }
}

/**
 * Rewrite the document in full. The new content goes to a sibling temp file
 * first and is renamed over the target, so readers see the old or the new
 * document and never a torn one.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    if (fs.existsSync(tmpPath)) {
      fs.rmSync(tmpPath, { force: true });
    }
    throw new PersistenceError(`Error writing ${filePath}: ${errorMessage(error)}`, 'write', { filePath });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * @fileoverview File-backed progress tracker.
 *
 * One JSON document per pipeline. Writes go to a temp file in the same
 * directory and are renamed over the target, so a crash leaves either the
 * old or the new state, never a partial one. Unknown fields are ignored on
 * read.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { StateCorruptedError } from '../../../utils/errors.js';
import type { PipelineName, ProcessingState, ProgressTracker } from '../types.js';

export const ZERO_STATE: ProcessingState = Object.freeze({
  lastProcessedTimestamp: null,
  lastProcessedMessageId: null,
  updatedAt: null,
});

/** On-disk shape; timestamps are ISO strings so the file diffs readably */
type StoredState = {
  version: 1;
  lastProcessedAt: string | null;
  lastProcessedMessageId: string | null;
  updatedAt: string | null;
};

export function statePathFor(stateDir: string, pipeline: PipelineName): string {
  return join(stateDir, `${pipeline}-state.json`);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function optionalString(value: unknown, field: string, path: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new StateCorruptedError(path, `${field} must be a string`);
  }
  return value;
}

/**
 * Parse a stored state document.
 *
 * @throws StateCorruptedError on invalid JSON or wrongly typed fields
 */
export function parseState(raw: string, path: string): ProcessingState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StateCorruptedError(path, error instanceof Error ? error.message : String(error));
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new StateCorruptedError(path, 'not a JSON object');
  }

  const lastProcessedAt = optionalString(Reflect.get(parsed, 'lastProcessedAt'), 'lastProcessedAt', path);
  const lastProcessedMessageId = optionalString(Reflect.get(parsed, 'lastProcessedMessageId'), 'lastProcessedMessageId', path);
  const updatedAt = optionalString(Reflect.get(parsed, 'updatedAt'), 'updatedAt', path);

  let lastProcessedTimestamp: number | null = null;
  if (lastProcessedAt !== null) {
    lastProcessedTimestamp = Date.parse(lastProcessedAt);
    if (Number.isNaN(lastProcessedTimestamp)) {
      throw new StateCorruptedError(path, `lastProcessedAt is not a date: ${lastProcessedAt}`);
    }
  }

  return { lastProcessedTimestamp, lastProcessedMessageId, updatedAt };
}

export function serializeState(state: ProcessingState): string {
  const stored: StoredState = {
    version: 1,
    lastProcessedAt: state.lastProcessedTimestamp === null
      ? null
      : new Date(state.lastProcessedTimestamp).toISOString(),
    lastProcessedMessageId: state.lastProcessedMessageId,
    updatedAt: state.updatedAt,
  };
  return `${JSON.stringify(stored, null, 2)}\n`;
}

export class FileProgressTracker implements ProgressTracker {
  constructor(private readonly path: string) {}

  async load(): Promise<ProcessingState> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return { ...ZERO_STATE };
      throw error;
    }
    return parseState(raw, this.path);
  }

  async save(state: ProcessingState): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, serializeState(state), 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

export function createFileProgressTracker(stateDir: string, pipeline: PipelineName): FileProgressTracker {
  return new FileProgressTracker(statePathFor(stateDir, pipeline));
}

/**
 * @fileoverview Shared plumbing for CLI commands: store lifecycle, argument
 * helpers and JSON output
 */

import { createSqliteWorldModelStore } from '../storage/sqlite_store.js';
import type { SqliteWorldModelStore } from '../storage/sqlite_store.js';
import { WorldModelEngine } from '../world_model/engine.js';
import { isRefKind, parseNodeRef } from '../world_model/types.js';
import type { EntityRef } from '../world_model/types.js';
import { resolveDbPath } from './db_path.js';
import { createError } from './errors.js';

export interface CommandOptions {
  workspace: string;
  args: string[];
}

/** Options every command accepts; main() has already acted on them. */
export const GLOBAL_OPTIONS = {
  workspace: { type: 'string', short: 'w' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

/**
 * Run a parseArgs call, reporting unknown or malformed options as usage
 * errors.
 */
export function parseOrUsage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createError('INVALID_ARGUMENT', message);
  }
}

const NEGATIVE_NUMBER = /^-(\d+(\.\d*)?|\.\d+)$/;

/**
 * parseArgs reads `-0.2` as a short option. Move bare negative numbers behind
 * a `--` terminator, keeping their order, so they arrive as positionals.
 */
export function protectNegativeNumbers(args: readonly string[]): string[] {
  if (args.includes('--')) return [...args];
  const negatives = args.filter((arg) => NEGATIVE_NUMBER.test(arg));
  if (negatives.length === 0) return [...args];
  return [...args.filter((arg) => !NEGATIVE_NUMBER.test(arg)), '--', ...negatives];
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/** A change magnitude in [-1, 1]. */
export function parseMagnitude(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed) || parsed < -1 || parsed > 1) {
    throw createError('INVALID_ARGUMENT', `${name} must be a number between -1 and 1, got "${value ?? ''}"`);
  }
  return parsed;
}

export function parseEntityRef(value: string): EntityRef {
  const ref = parseNodeRef(value);
  if (!ref || !isRefKind(ref.refKind)) {
    throw createError('INVALID_ARGUMENT', `Expected kind:id with a known kind, got "${value}"`);
  }
  return ref;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Open the workspace database, build an engine over it and close the store
 * when `work` settles.
 */
export async function withEngine<T>(
  workspace: string,
  work: (engine: WorldModelEngine, store: SqliteWorldModelStore) => Promise<T>,
): Promise<T> {
  const dbPath = await resolveDbPath(workspace);
  const store = createSqliteWorldModelStore(dbPath);
  await store.initialize();
  try {
    const engine = new WorldModelEngine({ store });
    return await work(engine, store);
  } finally {
    await store.close();
  }
}

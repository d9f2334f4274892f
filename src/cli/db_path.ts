/**
 * @fileoverview Database path resolution for the CLI
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export const DATA_DIRNAME = '.world-model';
export const SQLITE_FILENAME = 'world-model.sqlite';

/**
 * `WORLD_MODEL_DB_PATH` when set (relative to the workspace), otherwise
 * `<workspace>/.world-model/world-model.sqlite`. The parent directory is
 * created if missing.
 */
export async function resolveDbPath(
  workspace: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const override = env.WORLD_MODEL_DB_PATH?.trim();
  const dbPath = override
    ? path.resolve(workspace, override)
    : path.join(workspace, DATA_DIRNAME, SQLITE_FILENAME);

  await fs.mkdir(path.dirname(dbPath), { recursive: true });
  return dbPath;
}

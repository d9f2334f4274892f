/**
 * @fileoverview Stats command - Show mechanism graph statistics
 */

import { parseArgs } from 'node:util';
import { GLOBAL_OPTIONS, parseOrUsage, printJson, withEngine } from '../session.js';
import type { CommandOptions } from '../session.js';

export async function statsCommand(options: CommandOptions): Promise<void> {
  parseOrUsage(() => parseArgs({
    args: options.args,
    options: { ...GLOBAL_OPTIONS },
    allowPositionals: false,
    strict: true,
  }));

  const stats = await withEngine(options.workspace, (engine) => engine.getCachedStats());
  printJson(stats);
}

/**
 * @fileoverview Mine-loops command - Detect feedback loops and persist them
 */

import { parseArgs } from 'node:util';
import { GLOBAL_OPTIONS, parseOrUsage, parsePositiveInt, printJson, withEngine } from '../session.js';
import type { CommandOptions } from '../session.js';

export async function mineLoopsCommand(options: CommandOptions): Promise<void> {
  const { values } = parseOrUsage(() => parseArgs({
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      'max-loops': { type: 'string' },
      'max-cycle-length': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
    },
    allowPositionals: false,
    strict: true,
  }));

  const maxLoops = parsePositiveInt(values['max-loops'], '--max-loops');
  const maxCycleLength = parsePositiveInt(values['max-cycle-length'], '--max-cycle-length');
  const dryRun = values['dry-run'] ?? false;

  const report = await withEngine(options.workspace, (engine) =>
    engine.mineLoops({ maxLoops, maxCycleLength, dryRun }));

  printJson({
    dryRun: report.dryRun,
    detected: report.loops.length,
    written: report.written,
    skipped: report.skipped,
    loops: report.loops.map((loop) => ({
      loopId: loop.loopId,
      loopType: loop.loopType,
      nodes: loop.nodes,
      edgeIds: loop.edgeIds,
    })),
  });
}

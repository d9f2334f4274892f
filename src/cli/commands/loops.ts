/**
 * @fileoverview Loops command - List persisted feedback loops
 */

import { parseArgs } from 'node:util';
import { summarizeLoop } from '../../world_model/loop_detector.js';
import {
  GLOBAL_OPTIONS,
  parseEntityRef,
  parseOrUsage,
  parsePositiveInt,
  printJson,
  withEngine,
} from '../session.js';
import type { CommandOptions } from '../session.js';

export async function loopsCommand(options: CommandOptions): Promise<void> {
  const { values } = parseOrUsage(() => parseArgs({
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      pillar: { type: 'string', multiple: true },
      entity: { type: 'string', multiple: true },
      'top-k': { type: 'string' },
    },
    allowPositionals: false,
    strict: true,
  }));

  const pillars = values.pillar ?? [];
  const entities = (values.entity ?? []).map(parseEntityRef);
  const topK = parsePositiveInt(values['top-k'], '--top-k');
  const ranked = pillars.length > 0 || entities.length > 0;

  const loops = await withEngine(options.workspace, (engine) =>
    ranked ? engine.retrieveRelevantLoops(entities, pillars, topK) : engine.getCachedLoops());

  printJson(loops.slice(0, ranked ? loops.length : topK).map((loop) => ({
    ...loop,
    summary: summarizeLoop(loop),
  })));
}

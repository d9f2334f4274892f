/**
 * @fileoverview Plan command - Compute an intervention plan toward a goal
 */

import { parseArgs } from 'node:util';
import { validateInterventionPlan } from '../../world_model/intervention_planner.js';
import { createError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseEntityRef,
  parseOrUsage,
  parsePositiveInt,
  printJson,
  withEngine,
} from '../session.js';
import type { CommandOptions } from '../session.js';

export async function planCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseOrUsage(() => parseArgs({
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      entity: { type: 'string', multiple: true },
      'max-steps': { type: 'string' },
      'max-depth': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  }));

  const goal = positionals.join(' ').trim();
  if (!goal) {
    throw createError('INVALID_ARGUMENT', 'A goal is required. Usage: world-model plan <goal> [--entity kind:id]...');
  }

  const plan = await withEngine(options.workspace, (engine) => engine.computeInterventionPlan({
    goal,
    detectedEntities: (values.entity ?? []).map(parseEntityRef),
    maxSteps: parsePositiveInt(values['max-steps'], '--max-steps'),
    maxDepth: parsePositiveInt(values['max-depth'], '--max-depth'),
  }));

  printJson({ ...plan, issues: validateInterventionPlan(plan) });
}

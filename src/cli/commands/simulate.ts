/**
 * @fileoverview Simulate and what-if commands - Propagate changes through the graph
 */

import { parseArgs } from 'node:util';
import { createError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseEntityRef,
  parseMagnitude,
  parseOrUsage,
  parsePositiveInt,
  printJson,
  protectNegativeNumbers,
  withEngine,
} from '../session.js';
import type { CommandOptions } from '../session.js';

export async function simulateCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseOrUsage(() => parseArgs({
    args: protectNegativeNumbers(options.args),
    options: {
      ...GLOBAL_OPTIONS,
      'max-steps': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  }));

  const [nodeRef, magnitudeArg] = positionals;
  if (!nodeRef) {
    throw createError('INVALID_ARGUMENT', 'A node is required. Usage: world-model simulate <kind:id> <magnitude>');
  }
  const ref = parseEntityRef(nodeRef);
  const magnitude = parseMagnitude(magnitudeArg, 'magnitude');
  const maxSteps = parsePositiveInt(values['max-steps'], '--max-steps');

  const result = await withEngine(options.workspace, (engine) =>
    engine.simulateChange(`${ref.refKind}:${ref.refId}`, magnitude, { maxSteps }));
  printJson(result);
}

/** Split `ID=MAGNITUDE`. */
export function parsePillarChange(value: string): [string, number] {
  const separator = value.lastIndexOf('=');
  const pillarId = separator > 0 ? value.slice(0, separator).trim() : '';
  if (!pillarId) {
    throw createError('INVALID_ARGUMENT', `Expected --pillar ID=MAGNITUDE, got "${value}"`);
  }
  return [pillarId, parseMagnitude(value.slice(separator + 1), `magnitude for ${pillarId}`)];
}

export async function whatIfCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseOrUsage(() => parseArgs({
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      pillar: { type: 'string', multiple: true },
      'max-steps': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  }));

  const scenario = positionals.join(' ').trim();
  const changes = (values.pillar ?? []).map(parsePillarChange);
  if (!scenario || changes.length === 0) {
    throw createError('INVALID_ARGUMENT', 'Usage: world-model what-if <scenario> --pillar ID=MAGNITUDE...');
  }
  const maxSteps = parsePositiveInt(values['max-steps'], '--max-steps');

  const result = await withEngine(options.workspace, (engine) =>
    engine.simulateWhatIf(scenario, Object.fromEntries(changes), { maxSteps }));
  printJson(result);
}

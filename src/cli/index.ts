#!/usr/bin/env node
/**
 * @fileoverview world-model CLI
 *
 * Commands:
 *   world-model import <graph.json>        - Import a mechanism graph
 *   world-model mine-loops [--dry-run]     - Detect and persist feedback loops
 *   world-model stats                      - Show graph statistics
 *   world-model loops [--pillar ID]...     - List or rank persisted loops
 *   world-model plan <goal>                - Compute an intervention plan
 *   world-model simulate <kind:id> <delta> - Propagate a change
 *   world-model what-if <scenario>         - Combine several pillar changes
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { setLogLevel } from '../telemetry/logger.js';
import { showHelp } from './help.js';
import { importCommand } from './commands/import.js';
import { mineLoopsCommand } from './commands/mine_loops.js';
import { statsCommand } from './commands/stats.js';
import { loopsCommand } from './commands/loops.js';
import { planCommand } from './commands/plan.js';
import { simulateCommand, whatIfCommand } from './commands/simulate.js';
import { classifyError, createError, formatError, getExitCode } from './errors.js';
import type { CommandOptions } from './session.js';

type CommandHandler = (options: CommandOptions) => Promise<void>;

const COMMANDS: Record<string, { description: string; usage: string; run: CommandHandler }> = {
  'import': {
    description: 'Import framework entities, nodes, edges and spans',
    usage: 'world-model import <graph.json>',
    run: importCommand,
  },
  'mine-loops': {
    description: 'Detect feedback loops and persist them',
    usage: 'world-model mine-loops [--max-loops N] [--max-cycle-length N] [--dry-run]',
    run: mineLoopsCommand,
  },
  'stats': {
    description: 'Show mechanism graph statistics',
    usage: 'world-model stats',
    run: statsCommand,
  },
  'loops': {
    description: 'List persisted loops, optionally ranked by pillar or entity',
    usage: 'world-model loops [--pillar ID]... [--entity kind:id]... [--top-k N]',
    run: loopsCommand,
  },
  'plan': {
    description: 'Compute an intervention plan toward a goal',
    usage: 'world-model plan <goal> [--entity kind:id]... [--max-steps N] [--max-depth N]',
    run: planCommand,
  },
  'simulate': {
    description: 'Propagate a change through the graph',
    usage: 'world-model simulate <kind:id> <magnitude> [--max-steps N]',
    run: simulateCommand,
  },
  'what-if': {
    description: 'Simulate several pillar changes together',
    usage: 'world-model what-if <scenario> --pillar ID=MAGNITUDE... [--max-steps N]',
    run: whatIfCommand,
  },
};

function reportError(error: unknown): void {
  console.error(formatError(error));
  process.exitCode = getExitCode(classifyError(error));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global options only; each command parses its own arguments strictly.
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w', default: process.cwd() },
      verbose: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    const { WORLD_MODEL_VERSION } = await import('../index.js');
    console.log(`world-model ${WORLD_MODEL_VERSION}`);
    return;
  }

  const command = positionals[0];
  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  if (values.verbose === true) setLogLevel('debug');
  const workspace = typeof values.workspace === 'string' ? values.workspace : process.cwd();

  const entry = COMMANDS[command];
  if (!entry) {
    reportError(createError(
      'INVALID_ARGUMENT',
      `Unknown command: ${command}. Available commands: ${Object.keys(COMMANDS).join(', ')}`,
    ));
    return;
  }

  const commandIndex = args.indexOf(command);
  const commandArgs = [...args.slice(0, commandIndex), ...args.slice(commandIndex + 1)];

  try {
    await entry.run({ workspace, args: commandArgs });
  } catch (error) {
    reportError(error);
  }
}

main().catch(reportError);

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { resolveDbPath } from '../db_path.js';
import { CliError } from '../errors.js';
import {
  parseEntityRef,
  parseMagnitude,
  parseOrUsage,
  parsePositiveInt,
  protectNegativeNumbers,
} from '../session.js';

const usageError = (fn: () => unknown): CliError | null => {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof CliError ? error : null;
  }
};

describe('protectNegativeNumbers', () => {
  it('moves bare negative numbers behind a terminator', () => {
    expect(protectNegativeNumbers(['pillar:P1', '-0.2', '--max-steps', '3'])).toEqual([
      'pillar:P1',
      '--max-steps',
      '3',
      '--',
      '-0.2',
    ]);
    expect(protectNegativeNumbers(['-.5', '-1'])).toEqual(['--', '-.5', '-1']);
  });

  it('leaves options and existing terminators alone', () => {
    expect(protectNegativeNumbers(['-h', '--verbose'])).toEqual(['-h', '--verbose']);
    expect(protectNegativeNumbers(['--', '-0.2', '-1'])).toEqual(['--', '-0.2', '-1']);
  });
});

describe('argument parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt(undefined, '--top-k')).toBeUndefined();
    expect(parsePositiveInt('3', '--top-k')).toBe(3);
    expect(usageError(() => parsePositiveInt('0', '--top-k'))?.message).toBe('--top-k must be a positive integer, got "0"');
    expect(usageError(() => parsePositiveInt('2.5', '--top-k'))?.code).toBe('INVALID_ARGUMENT');
  });

  it('parses magnitudes in [-1, 1]', () => {
    expect(parseMagnitude('0.4', 'magnitude')).toBe(0.4);
    expect(parseMagnitude('-1', 'magnitude')).toBe(-1);
    expect(usageError(() => parseMagnitude('1.5', 'magnitude'))?.message).toBe(
      'magnitude must be a number between -1 and 1, got "1.5"',
    );
    expect(usageError(() => parseMagnitude(' ', 'magnitude'))?.code).toBe('INVALID_ARGUMENT');
    expect(usageError(() => parseMagnitude(undefined, 'magnitude'))?.message).toBe(
      'magnitude must be a number between -1 and 1, got ""',
    );
  });

  it('parses entity references with a known kind', () => {
    expect(parseEntityRef('core_value:CV1')).toEqual({ refKind: 'core_value', refId: 'CV1' });
    expect(usageError(() => parseEntityRef('planet:X'))?.code).toBe('INVALID_ARGUMENT');
    expect(usageError(() => parseEntityRef('P1'))?.code).toBe('INVALID_ARGUMENT');
  });

  it('turns parser exceptions into usage errors', () => {
    const error = usageError(() => parseOrUsage(() => {
      throw new TypeError("Unknown option '--frobnicate'");
    }));
    expect(error?.code).toBe('INVALID_ARGUMENT');
    expect(error?.message).toBe("Unknown option '--frobnicate'");
  });
});

describe('resolveDbPath', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'world-model-cli-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('defaults to the workspace data directory and creates it', async () => {
    const dbPath = await resolveDbPath(workspace, {});
    expect(dbPath).toBe(join(workspace, '.world-model', 'world-model.sqlite'));
    expect((await stat(join(workspace, '.world-model'))).isDirectory()).toBe(true);
  });

  it('resolves WORLD_MODEL_DB_PATH against the workspace', async () => {
    const dbPath = await resolveDbPath(workspace, { WORLD_MODEL_DB_PATH: 'data/graph.sqlite' });
    expect(dbPath).toBe(join(workspace, 'data', 'graph.sqlite'));
  });
});

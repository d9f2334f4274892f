import { describe, it, expect } from 'vitest';
import { CliError } from '../../errors.js';
import { parsePillarChange } from '../simulate.js';

describe('parsePillarChange', () => {
  it('splits ID=MAGNITUDE', () => {
    expect(parsePillarChange('P1=0.3')).toEqual(['P1', 0.3]);
    expect(parsePillarChange('P2=-0.25')).toEqual(['P2', -0.25]);
  });

  it('rejects a missing id or an out-of-range magnitude', () => {
    expect(() => parsePillarChange('=0.3')).toThrow(CliError);
    expect(() => parsePillarChange('P1')).toThrow(CliError);
    expect(() => parsePillarChange('P1=2')).toThrow('magnitude for P1 must be a number between -1 and 1, got "2"');
  });
});

import { describe, expect, it } from 'vitest';
import { parseArgs, type OptionSpec } from './args.js';

const SPECS: OptionSpec[] = [
  { long: 'file', short: 'f', takesValue: true },
  { long: 'json', short: 'j' },
  { long: 'verbose', short: 'v' },
];

describe('parseArgs', () => {
  it('separates flags, values and positionals', () => {
    const parsed = parseArgs(['plan', '--json', '-f', 'plan.md', 'extra'], SPECS);

    expect([...parsed.flags]).toEqual(['json']);
    expect(parsed.values.get('file')).toBe('plan.md');
    expect(parsed.positionals).toEqual(['plan', 'extra']);
  });

  it('accepts --name=value', () => {
    const parsed = parseArgs(['--file=specs/001/spec.md'], SPECS);

    expect(parsed.values.get('file')).toBe('specs/001/spec.md');
  });

  it('keeps a lone dash and everything after -- as positionals', () => {
    const parsed = parseArgs(['-', '--', '--json', '-v'], SPECS);

    expect(parsed.positionals).toEqual(['-', '--json', '-v']);
    expect(parsed.flags.size).toBe(0);
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--colour'], SPECS)).toThrow('Unknown option: --colour');
    expect(() => parseArgs(['--colour=red'], SPECS)).toThrow('Unknown option: --colour');
  });

  it('requires a value for value options', () => {
    expect(() => parseArgs(['--file'], SPECS)).toThrow('Option --file requires a value');
  });
});

// Tests for CLI argument parsing

import { describe, it, expect } from 'vitest';
import { CliUsageError, parseAskArgs } from '../src/cli-args.js';

describe('parseAskArgs', () => {
  it('joins the question words and reads a single year', () => {
    const args = parseAskArgs(['--year', '2023', 'What', 'is', 'revenue?']);

    expect(args.question).toBe('What is revenue?');
    expect(args.filters).toEqual({ fiscalYearRange: { from: 2023, to: 2023 } });
    expect(args.json).toBe(false);
  });

  it('collects list flags from repeats and commas', () => {
    const args = parseAskArgs([
      '--docs', 'a.json,b.json', '--docs', 'c.json',
      '--statement', 'income_statement,notes',
      '--kind', 'tabular',
      '--document', 'annual-2023',
      '--json',
      'net margin',
    ]);

    expect(args.documentFiles).toEqual(['a.json', 'b.json', 'c.json']);
    expect(args.filters).toEqual({
      statementTypes: ['income_statement', 'notes'],
      chunkKinds: ['tabular'],
      documentIds: ['annual-2023'],
    });
    expect(args.json).toBe(true);
  });

  it('keeps an open-ended range', () => {
    expect(parseAskArgs(['--from', '2021', 'q']).filters).toEqual({ fiscalYearRange: { from: 2021 } });
  });

  it('reports usage errors', () => {
    expect(() => parseAskArgs(['--year', '99'])).toThrow('--year expects a four-digit year, got "99"');
    expect(() => parseAskArgs(['--from', '2024', '--to', '2022'])).toThrow('--from 2024 is after --to 2022');
    expect(() => parseAskArgs(['--kind', 'chart'])).toThrow('Unknown chunk kind "chart". Valid: narrative, tabular, mixed');
    expect(() => parseAskArgs(['--statement', 'p_and_l'])).toThrow(CliUsageError);
    expect(() => parseAskArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('flags help', () => {
    expect(parseAskArgs(['-h']).help).toBe(true);
  });
});

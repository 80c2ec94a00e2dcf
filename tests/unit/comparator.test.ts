import { describe, it, expect } from 'vitest';
import {
  compareOutput,
  lineDiff,
  normalizeOutput,
} from '../../src/runner/comparator.js';

describe('normalizeOutput', () => {
  it('drops trailing newlines at the end only', () => {
    expect(normalizeOutput('g\n')).toBe('g');
    expect(normalizeOutput('g\n\n\n')).toBe('g');
    expect(normalizeOutput('a\nb\r\n')).toBe('a\nb');
  });

  it('leaves inner whitespace alone', () => {
    expect(normalizeOutput('a  b\n\nc\n')).toBe('a  b\n\nc');
    expect(normalizeOutput('x \n')).toBe('x ');
  });

  it('keeps a lone carriage return that does not end a line', () => {
    expect(normalizeOutput('x\r')).toBe('x\r');
    expect(normalizeOutput('x\r\r\n')).toBe('x\r');
  });

  it('stays linear on long runs of blank lines before content', () => {
    const blanks = '\n'.repeat(400_000);
    const started = Date.now();

    expect(normalizeOutput(`${blanks}x\n\n`)).toBe(`${blanks}x`);
    expect(compareOutput(`${blanks}x\n\n`, `${blanks}x\n`)).toEqual({ status: 'passed' });
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('compareOutput', () => {
  it('passes on identical output', () => {
    expect(compareOutput('!OK\n', '!OK\n')).toEqual({ status: 'passed' });
  });

  it('ignores a missing or extra trailing newline', () => {
    expect(compareOutput('g', 'g\n')).toEqual({ status: 'passed' });
    expect(compareOutput('a\nb\n\n', 'a\nb\n')).toEqual({ status: 'passed' });
  });

  it('fails when a single character differs', () => {
    const outcome = compareOutput('h\n', 'g\n');

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.expected).toBe('g\n');
      expect(outcome.actual).toBe('h\n');
      expect(outcome.diff).toEqual([
        { kind: 'expected', text: 'g' },
        { kind: 'actual', text: 'h' },
      ]);
    }
  });

  it('does not collapse whitespace inside the report', () => {
    expect(compareOutput('x \n', 'x\n').status).toBe('failed');
    expect(compareOutput('a\n\nb\n', 'a\nb\n').status).toBe('failed');
  });

  it('treats listing order as significant', () => {
    const outcome = compareOutput('b\na\n', 'a\nb\n');
    expect(outcome.status).toBe('failed');
  });

  it('tells the sentinel apart from a listing', () => {
    const outcome = compareOutput('!OK\n', 'x\n');

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.diff).toEqual([
        { kind: 'expected', text: 'x' },
        { kind: 'actual', text: '!OK' },
      ]);
    }
  });

  it('keeps shared lines as context in the diff', () => {
    const outcome = compareOutput('a\nc\n', 'a\nb\n');

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.diff).toEqual([
        { kind: 'context', text: 'a' },
        { kind: 'expected', text: 'b' },
        { kind: 'actual', text: 'c' },
      ]);
    }
  });

  it('reports empty actual output as a diff line', () => {
    const outcome = compareOutput('', 'g\n');

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.diff).toEqual([
        { kind: 'expected', text: 'g' },
        { kind: 'actual', text: '' },
      ]);
    }
  });

  it('is idempotent', () => {
    const first = compareOutput('a\nb\n', 'a\nc\n');
    const second = compareOutput('a\nb\n', 'a\nc\n');

    expect(second).toEqual(first);
  });
});

describe('lineDiff', () => {
  it('returns only context lines for equal input', () => {
    expect(lineDiff('a\nb', 'a\nb')).toEqual([
      { kind: 'context', text: 'a' },
      { kind: 'context', text: 'b' },
    ]);
  });
});

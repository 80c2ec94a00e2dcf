import { diffLines } from 'diff';
import type { ComparisonOutcome, DiffLine, DiffLineKind } from '../types.js';

/** Drops the line terminators at the very end of a report; nothing else changes. */
export function normalizeOutput(text: string): string {
  let end = text.length;
  while (end > 0 && text[end - 1] === '\n') {
    end -= 1;
    if (end > 0 && text[end - 1] === '\r') end -= 1;
  }
  return text.slice(0, end);
}

function splitLines(value: string): string[] {
  const lines = value.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Line-oriented diff of two normalized reports. Lines only in the expected
 * report come out as `expected`, lines only in the actual one as `actual`.
 */
export function lineDiff(expected: string, actual: string): DiffLine[] {
  const lines: DiffLine[] = [];

  for (const change of diffLines(`${expected}\n`, `${actual}\n`)) {
    const kind: DiffLineKind = change.added
      ? 'actual'
      : change.removed
        ? 'expected'
        : 'context';
    for (const text of splitLines(change.value)) {
      lines.push({ kind, text });
    }
  }

  return lines;
}

/**
 * Compares analyzer output against the expected report. The sentinel
 * "no findings" line and item listings are both compared as plain text:
 * listing order is whatever the fixture authors wrote.
 */
export function compareOutput(
  actual: string,
  expected: string,
): ComparisonOutcome {
  const normalizedActual = normalizeOutput(actual);
  const normalizedExpected = normalizeOutput(expected);

  if (normalizedActual === normalizedExpected) {
    return { status: 'passed' };
  }

  return {
    status: 'failed',
    expected,
    actual,
    diff: lineDiff(normalizedExpected, normalizedActual),
  };
}

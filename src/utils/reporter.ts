/**
 * ConsoleReporter - renders suite progress, diffs and summaries for humans
 */

import type {
  CaseOutcome,
  DiffLine,
  SuiteReport,
  TestCase,
} from '../types.js';

// ANSI color codes
export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
};

const RULE_WIDTH = 70;

export type Sink = (line: string) => void;

export interface ReporterOptions {
  verbose?: boolean;
  color?: boolean;
  write?: Sink;
}

export interface JsonReport {
  total: number;
  passed: number;
  failed: number;
  categories: { category: string; passed: number; total: number }[];
  results: {
    category: string;
    name: string;
    status: CaseOutcome['status'];
    detail?: string;
  }[];
  durationMs: number;
}

function outcomeDetail(outcome: CaseOutcome): string | undefined {
  switch (outcome.status) {
    case 'passed':
      return undefined;
    case 'failed':
      return renderDiffPlain(outcome.diff);
    case 'timeout':
      return `Timeout (>${outcome.timeoutMs}ms)`;
    case 'errored':
      return outcome.cause;
  }
}

function renderDiffPlain(diff: readonly DiffLine[]): string {
  return diff.map(diffPrefix).join('\n');
}

function diffPrefix(line: DiffLine): string {
  const marker =
    line.kind === 'expected' ? '-' : line.kind === 'actual' ? '+' : ' ';
  return `${marker} ${line.text}`;
}

export function toJsonReport(report: SuiteReport, durationMs: number): JsonReport {
  return {
    total: report.total,
    passed: report.passed,
    failed: report.failed,
    categories: report.categories.map((c) => ({ ...c })),
    results: report.outcomes.map((o) => {
      const detail = outcomeDetail(o);
      return {
        category: o.category,
        name: o.name,
        status: o.status,
        ...(detail !== undefined ? { detail } : {}),
      };
    }),
    durationMs,
  };
}

export class ConsoleReporter {
  private readonly verbose: boolean;
  private readonly color: boolean;
  private readonly write: Sink;
  private currentCategory: string | null = null;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? true;
    this.write = options.write ?? ((line) => console.log(line));
  }

  private paint(color: keyof typeof COLORS, text: string): string {
    return this.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  }

  header(title: string): void {
    const rule = '='.repeat(RULE_WIDTH);
    const pad = Math.max(0, Math.floor((RULE_WIDTH - title.length) / 2));
    this.write('');
    this.write(this.paint('blue', rule));
    this.write(this.paint('blue', `${' '.repeat(pad)}${title}`));
    this.write(this.paint('blue', rule));
    this.write('');
  }

  info(message: string): void {
    this.write(message);
  }

  success(message: string): void {
    this.write(this.paint('green', `✓ ${message}`));
  }

  warn(message: string): void {
    this.write(this.paint('yellow', `⚠ ${message}`));
  }

  error(message: string): void {
    this.write(this.paint('red', `✗ ${message}`));
  }

  caseStarted(testCase: TestCase): void {
    if (testCase.category === this.currentCategory) return;
    this.currentCategory = testCase.category;
    this.write('');
    this.write(this.paint('bold', `Category: ${testCase.category.toUpperCase()}`));
  }

  caseCompleted(outcome: CaseOutcome): void {
    const label = `  ${outcome.name}`;

    switch (outcome.status) {
      case 'passed':
        this.write(`${label} ${this.paint('green', '✓ PASS')}`);
        return;
      case 'failed':
        this.write(`${label} ${this.paint('red', '✗ FAIL: Output mismatch')}`);
        if (this.verbose) this.renderDiff(outcome.diff);
        return;
      case 'timeout':
        this.write(
          `${label} ${this.paint('red', `✗ TIMEOUT (>${outcome.timeoutMs}ms)`)}`,
        );
        return;
      case 'errored':
        this.write(`${label} ${this.paint('red', '✗ ERROR')}`);
        if (this.verbose) {
          for (const line of outcome.cause.split('\n')) {
            this.write(this.paint('dim', `      ${line}`));
          }
        }
        return;
    }
  }

  renderDiff(diff: readonly DiffLine[]): void {
    for (const line of diff) {
      const text = `      ${diffPrefix(line)}`;
      if (line.kind === 'expected') {
        this.write(this.paint('red', text));
      } else if (line.kind === 'actual') {
        this.write(this.paint('green', text));
      } else {
        this.write(this.paint('dim', text));
      }
    }
  }

  summary(report: SuiteReport, durationMs: number): void {
    this.header('SUMMARY');

    const width = Math.max(12, ...report.categories.map((c) => c.category.length));
    for (const tally of report.categories) {
      const line = `  ${tally.category.padEnd(width)} ${String(tally.passed).padStart(2)}/${String(tally.total).padStart(2)} passed`;
      this.write(
        tally.passed === tally.total
          ? this.paint('green', line)
          : this.paint('red', line),
      );
    }

    this.write('');
    this.write(`Total:  ${report.total}`);
    this.write(this.paint('green', `Passed: ${report.passed}`));
    if (report.failed > 0) {
      this.write(this.paint('red', `Failed: ${report.failed}`));
    }
    this.write(`Time:   ${durationMs}ms`);

    if (report.failed === 0 && report.total > 0) {
      this.write('');
      this.write(this.paint('green', '✓ ALL TESTS PASSED!'));
    }
  }
}

import PQueue from 'p-queue';
import type {
  BuildArtifact,
  CaseOutcome,
  Category,
  CategoryTally,
  ExecutionResult,
  SuiteReport,
  TestCase,
} from '../types.js';
import { errorMessage } from '../errors.js';
import { compareOutput } from './comparator.js';
import { runCase, type CaseRunOptions } from './case-runner.js';

export type CaseExecutor = (
  artifact: BuildArtifact,
  testCase: TestCase,
  options: CaseRunOptions,
) => Promise<ExecutionResult>;

/** Everything one suite run needs; nothing is read from module state. */
export interface RunContext extends CaseRunOptions {
  artifact: BuildArtifact;
  categories: readonly Category[];
  concurrency?: number;
  runner?: CaseExecutor;
  onCaseStart?: (testCase: TestCase, index: number, total: number) => void;
  onCaseComplete?: (outcome: CaseOutcome, index: number, total: number) => void;
}

function describeExit(execution: ExecutionResult): string {
  const parts = [`Analyzer exited with code ${execution.exitCode}`];
  if (execution.stderr.trim()) parts.push(`STDERR: ${execution.stderr.trim()}`);
  if (execution.stdout.trim()) parts.push(`STDOUT: ${execution.stdout.trim()}`);
  return parts.join('\n');
}

/** Turns one execution into an outcome. Timed-out runs are never compared. */
export function evaluateCase(
  testCase: TestCase,
  execution: ExecutionResult,
  timeoutMs: number,
): CaseOutcome {
  const id = { category: testCase.category, name: testCase.name };

  if (execution.timedOut) {
    return { ...id, status: 'timeout', timeoutMs };
  }
  if (execution.processError !== undefined) {
    return { ...id, status: 'errored', cause: execution.processError };
  }
  if (execution.exitCode !== 0) {
    return { ...id, status: 'errored', cause: describeExit(execution) };
  }
  if (execution.output === undefined) {
    return { ...id, status: 'errored', cause: 'Output file not created' };
  }

  return { ...id, ...compareOutput(execution.output, testCase.expected) };
}

/** Folds outcomes into per-category tallies, keeping category order. */
export function tallyOutcomes(
  categories: readonly Category[],
  outcomes: readonly CaseOutcome[],
): CategoryTally[] {
  const tallies = new Map<string, CategoryTally>();
  for (const category of categories) {
    tallies.set(category.name, {
      category: category.name,
      passed: 0,
      total: 0,
    });
  }

  for (const outcome of outcomes) {
    const tally = tallies.get(outcome.category);
    if (!tally) continue;
    tally.total += 1;
    if (outcome.status === 'passed') tally.passed += 1;
  }

  return [...tallies.values()].filter((t) => t.total > 0);
}

export function buildReport(
  categories: readonly Category[],
  outcomes: readonly CaseOutcome[],
): SuiteReport {
  const tallies = tallyOutcomes(categories, outcomes);
  const passed = tallies.reduce((sum, t) => sum + t.passed, 0);
  const total = tallies.reduce((sum, t) => sum + t.total, 0);

  return Object.freeze({
    total,
    passed,
    failed: total - passed,
    categories: Object.freeze(tallies.map((t) => Object.freeze(t))),
    outcomes: Object.freeze([...outcomes]),
    failures: Object.freeze(outcomes.filter((o) => o.status !== 'passed')),
  });
}

/**
 * Runs every case of the given categories and folds the outcomes into a
 * report. A case that crashes, hangs or throws is recorded and the run moves
 * on. With concurrency above one, outcomes still land in discovery order.
 */
export async function runSuite(context: RunContext): Promise<SuiteReport> {
  const runner = context.runner ?? runCase;
  const cases = context.categories.flatMap((c) => c.cases);
  const outcomes: CaseOutcome[] = new Array(cases.length);

  const runOne = async (testCase: TestCase, index: number): Promise<void> => {
    context.onCaseStart?.(testCase, index, cases.length);

    let outcome: CaseOutcome;
    try {
      const execution = await runner(context.artifact, testCase, context);
      outcome = evaluateCase(testCase, execution, context.timeoutMs);
    } catch (error) {
      outcome = {
        category: testCase.category,
        name: testCase.name,
        status: 'errored',
        cause: errorMessage(error),
      };
    }

    outcomes[index] = outcome;
    context.onCaseComplete?.(outcome, index, cases.length);
  };

  const concurrency = context.concurrency ?? 1;
  if (concurrency <= 1) {
    for (let i = 0; i < cases.length; i++) {
      await runOne(cases[i], i);
    }
  } else {
    const queue = new PQueue({ concurrency });
    await Promise.all(cases.map((testCase, i) => queue.add(() => runOne(testCase, i))));
  }

  return buildReport(context.categories, outcomes);
}

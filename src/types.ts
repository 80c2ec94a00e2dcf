export type CaseStatus = 'passed' | 'failed' | 'timeout' | 'errored';

export type InputMode = 'argument' | 'stdin';
export type OutputMode = 'file' | 'stdout';

export interface TestCase {
  readonly category: string;
  readonly name: string;
  readonly inputPath: string;
  readonly expectedPath: string;
  readonly input: string;
  readonly expected: string;
}

export interface Category {
  readonly name: string;
  readonly cases: readonly TestCase[];
}

export interface CaseFilter {
  /** Exact category name, or its last path segment (`global` for `unofficial/global`). */
  category?: string;
  /** First path segment of the category name, e.g. `official`. */
  group?: string;
  /** Substring of the case name. */
  name?: string;
}

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
  durationMs: number;
  timedOut: boolean;
  /** Report produced by the analyzer, undefined when none was written. */
  output?: string;
  /** Set when the process could not be launched or was ended by a signal. */
  processError?: string;
}

export type DiffLineKind = 'context' | 'expected' | 'actual';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export type ComparisonOutcome =
  | { status: 'passed' }
  | { status: 'failed'; expected: string; actual: string; diff: DiffLine[] };

interface CaseIdentity {
  category: string;
  name: string;
}

export type CaseOutcome = CaseIdentity &
  (
    | { status: 'passed' }
    | {
        status: 'failed';
        expected: string;
        actual: string;
        diff: DiffLine[];
      }
    | { status: 'timeout'; timeoutMs: number }
    | { status: 'errored'; cause: string }
  );

export interface CategoryTally {
  category: string;
  passed: number;
  total: number;
}

export interface SuiteReport {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly categories: readonly CategoryTally[];
  readonly outcomes: readonly CaseOutcome[];
  readonly failures: readonly CaseOutcome[];
}

export interface BuildArtifact {
  readonly executablePath: string;
  readonly workDir: string;
}

export interface SourceRoot {
  /** Extraction directory, removed by cleanup(). */
  readonly root: string;
  readonly sourceDir: string;
  readonly buildDescriptor: string;
  readonly identifiers: readonly string[];
  cleanup(): void;
}

export interface ArchiveSummary {
  identifiers: string[];
  sourceFileCount: number;
}

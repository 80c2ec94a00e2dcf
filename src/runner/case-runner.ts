import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { execa, ExecaError } from 'execa';
import type {
  BuildArtifact,
  ExecutionResult,
  InputMode,
  OutputMode,
  TestCase,
} from '../types.js';
import { killProcessTree } from '../utils/process-tree.js';

export const OUTPUT_FILE_NAME = 'analyzer-output.txt';
// The analyzer drops debug files into ./output relative to its cwd.
export const DEBUG_DIR_NAME = 'output';

export interface CaseRunOptions {
  timeoutMs: number;
  /** Command prefix the executable is run through, e.g. ["java", "-jar"]. */
  launcher: readonly string[];
  inputMode: InputMode;
  outputMode: OutputMode;
}

export function buildInvocation(
  artifact: BuildArtifact,
  testCase: TestCase,
  outputPath: string,
  options: Pick<CaseRunOptions, 'launcher' | 'inputMode' | 'outputMode'>,
): { file: string; args: string[] } {
  const [file, ...prefix] = [...options.launcher, artifact.executablePath];
  const args = [...prefix];

  if (options.inputMode === 'argument') {
    args.push(testCase.inputPath);
  }
  if (options.outputMode === 'file') {
    args.push(outputPath);
  }

  return { file, args };
}

function readOutput(
  outputMode: OutputMode,
  outputPath: string,
  stdout: string,
): string | undefined {
  if (outputMode === 'stdout') return stdout;
  return fs.existsSync(outputPath)
    ? fs.readFileSync(outputPath, 'utf-8')
    : undefined;
}

/**
 * Runs the analyzer on one test case in a private working directory. The
 * timeout is the only cancellation: when it fires the process group is
 * killed and the result is marked timed out, whatever it printed so far.
 */
export async function runCase(
  artifact: BuildArtifact,
  testCase: TestCase,
  options: CaseRunOptions,
): Promise<ExecutionResult> {
  const startTime = Date.now();
  const caseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'grader-case-'));
  fs.mkdirSync(path.join(caseDir, DEBUG_DIR_NAME));
  const outputPath = path.join(caseDir, OUTPUT_FILE_NAME);

  const { file, args } = buildInvocation(artifact, testCase, outputPath, options);
  const controller = new AbortController();
  let timedOut = false;

  try {
    const subprocess = execa(file, args, {
      cwd: caseDir,
      reject: false,
      detached: true,
      cancelSignal: controller.signal,
      stripFinalNewline: false,
      ...(options.inputMode === 'stdin'
        ? { input: testCase.input }
        : { stdin: 'ignore' as const }),
    });

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(subprocess);
      controller.abort();
    }, options.timeoutMs);

    const result = await subprocess.finally(() => clearTimeout(timer));
    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    const execution: ExecutionResult = {
      stdout,
      stderr,
      exitCode: result.exitCode,
      durationMs: Date.now() - startTime,
      timedOut,
    };

    if (timedOut) {
      return execution;
    }

    // No exit code: the process never started, or a signal ended it.
    if (result instanceof ExecaError && result.exitCode === undefined) {
      return { ...execution, processError: result.shortMessage };
    }

    return {
      ...execution,
      output: readOutput(options.outputMode, outputPath, stdout),
    };
  } finally {
    fs.rmSync(caseDir, { recursive: true, force: true });
  }
}

import * as fs from 'fs';
import * as path from 'path';
import { execa } from 'execa';
import type { BuildArtifact } from '../types.js';
import { BuildError } from '../errors.js';
import { killProcessTree } from '../utils/process-tree.js';

export interface BuildOptions {
  buildCommand: readonly string[];
  executableName: string;
  buildTimeoutMs: number;
  /** When empty the executable is run directly and must carry the execute bit. */
  launcher: readonly string[];
}

export type LocateOptions = Pick<BuildOptions, 'executableName' | 'launcher'>;

function checkExecutable(
  executablePath: string,
  launcher: readonly string[],
): string | null {
  if (!fs.existsSync(executablePath)) {
    return `${path.basename(executablePath)} executable not created at ${executablePath}`;
  }
  if (!fs.statSync(executablePath).isFile()) {
    return `${executablePath} is not a regular file`;
  }

  const mode = launcher.length === 0 ? fs.constants.X_OK : fs.constants.R_OK;
  try {
    fs.accessSync(executablePath, mode);
  } catch {
    return `${executablePath} is not ${launcher.length === 0 ? 'executable' : 'readable'}`;
  }
  return null;
}

/**
 * Runs the build tool inside the submission's source directory and returns
 * the executable it produced. Build output is kept verbatim on failure.
 */
export async function buildAnalyzer(
  sourceDir: string,
  options: BuildOptions,
): Promise<BuildArtifact> {
  const [command, ...args] = options.buildCommand;
  const controller = new AbortController();
  let timedOut = false;

  // Own process group: the timeout reaches every compiler the build tool started.
  const subprocess = execa(command, args, {
    cwd: sourceDir,
    reject: false,
    all: true,
    stdin: 'ignore',
    detached: true,
    cancelSignal: controller.signal,
    stripFinalNewline: false,
  });

  const timer = setTimeout(() => {
    timedOut = true;
    killProcessTree(subprocess);
    controller.abort();
  }, options.buildTimeoutMs);

  const result = await subprocess.finally(() => clearTimeout(timer));
  const output = typeof result.all === 'string' ? result.all : '';

  if (timedOut) {
    throw new BuildError(
      `Build timed out (>${options.buildTimeoutMs}ms)`,
      output,
    );
  }

  if (result.exitCode !== 0) {
    const reason =
      result.exitCode === undefined
        ? `could not run '${options.buildCommand.join(' ')}'`
        : `'${options.buildCommand.join(' ')}' exited with code ${result.exitCode}`;
    throw new BuildError(`Build failed: ${reason}`, output);
  }

  const executablePath = path.join(sourceDir, options.executableName);
  const problem = checkExecutable(executablePath, options.launcher);
  if (problem) {
    throw new BuildError(problem, output);
  }

  return { executablePath, workDir: sourceDir };
}

/** Local mode: the analyzer was built beforehand in `dir`. */
export function locateAnalyzer(dir: string, options: LocateOptions): BuildArtifact {
  const executablePath = path.resolve(dir, options.executableName);
  const problem = checkExecutable(executablePath, options.launcher);
  if (problem) {
    throw new BuildError(
      `${problem}. Build the analyzer first (cd ${dir} && make).`,
    );
  }
  return { executablePath, workDir: path.resolve(dir) };
}

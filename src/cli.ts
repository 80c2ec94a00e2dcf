import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import type { BuildArtifact, CaseFilter, Category, SuiteReport } from './types.js';
import { loadConfig, type ConfigOverrides } from './config.js';
import {
  BuildError,
  ConfigError,
  EXIT_FATAL,
  EXIT_OK,
  EXIT_TESTS_FAILED,
  errorMessage,
  exitCodeFor,
} from './errors.js';
import { runSuite } from './runner/suite-runner.js';
import { withSubmission, inspectArchive } from './submission/archive.js';
import { buildAnalyzer, locateAnalyzer } from './submission/builder.js';
import { createSubmission, parseIdentifiers, validateSourceDir } from './submission/pack.js';
import { ConsoleReporter, toJsonReport, type Sink } from './utils/reporter.js';
import {
  discoverCategories,
  matchesCategory,
  selectCases,
} from './utils/test-discovery.js';

export const VERSION = '1.0.0';

export interface CliIO {
  out: Sink;
  err: Sink;
  color?: boolean;
  /** Asks for identifiers when `pack` is given none; omitted means non-interactive. */
  prompt?: (question: string) => Promise<string>;
}

interface RunCommandOptions {
  zip?: string;
  analyzerDir?: string;
  corpus?: string;
  category?: string;
  official?: boolean;
  unofficial?: boolean;
  filter?: string;
  verbose?: boolean;
  timeout?: number;
  buildTimeout?: number;
  jobs?: number;
  output?: string;
  keepTemp?: boolean;
  dryRun?: boolean;
  config?: string;
}

interface PackCommandOptions {
  id?: string;
  ids?: string[];
  output?: string;
  force?: boolean;
  config?: string;
}

interface CheckCommandOptions {
  config?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function consolePrompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function resolveFilter(
  options: RunCommandOptions,
  categories: readonly Category[],
): CaseFilter {
  const filter: CaseFilter = {};

  if (options.category) {
    if (!categories.some((c) => matchesCategory(c.name, options.category ?? ''))) {
      throw new ConfigError(
        `Invalid category: ${options.category}\nValid categories: ${categories
          .map((c) => c.name)
          .join(', ')}`,
      );
    }
    filter.category = options.category;
  } else if (options.official && !options.unofficial) {
    filter.group = 'official';
  } else if (options.unofficial && !options.official) {
    filter.group = 'unofficial';
  }

  if (options.filter) filter.name = options.filter;
  return filter;
}

async function runCommand(
  options: RunCommandOptions,
  io: CliIO,
): Promise<number> {
  const overrides: ConfigOverrides = {
    corpusDir: options.corpus,
    analyzerDir: options.analyzerDir,
    timeoutMs: options.timeout,
    buildTimeoutMs: options.buildTimeout,
    concurrency: options.jobs,
  };
  const config = loadConfig(options.config, overrides);
  const reporter = new ConsoleReporter({
    verbose: options.verbose,
    color: io.color,
    write: io.out,
  });
  const startTime = Date.now();

  const corpusRoot = path.resolve(config.corpusDir);
  const categories = discoverCategories(corpusRoot, config);
  const selected = selectCases(categories, resolveFilter(options, categories));
  const caseCount = selected.reduce((n, c) => n + c.cases.length, 0);

  reporter.header(options.zip ? 'TEST SUITE RUNNER - SUBMISSION MODE' : 'TEST SUITE RUNNER');
  reporter.info(`Corpus: ${corpusRoot}`);
  reporter.info(`Tests selected: ${caseCount}`);

  if (options.dryRun) {
    reporter.info('\n[DRY RUN] Would run the following tests:');
    let i = 0;
    for (const category of selected) {
      for (const testCase of category.cases) {
        i += 1;
        reporter.info(`  ${i}. ${category.name}/${testCase.name}`);
      }
    }
    return EXIT_OK;
  }

  if (caseCount === 0) {
    reporter.warn('No tests selected.');
    return EXIT_OK;
  }

  const execute = async (artifact: BuildArtifact): Promise<SuiteReport> => {
    reporter.info(`Analyzer: ${artifact.executablePath}`);
    const sequential = config.concurrency <= 1;

    const report = await runSuite({
      artifact,
      categories: selected,
      timeoutMs: config.timeoutMs,
      launcher: config.launcher,
      inputMode: config.inputMode,
      outputMode: config.outputMode,
      concurrency: config.concurrency,
      onCaseStart: sequential ? (testCase) => reporter.caseStarted(testCase) : undefined,
      onCaseComplete: sequential ? (outcome) => reporter.caseCompleted(outcome) : undefined,
    });

    // Parallel runs print once everything is in, in discovery order.
    if (!sequential) {
      const cases = selected.flatMap((c) => c.cases);
      report.outcomes.forEach((outcome, i) => {
        reporter.caseStarted(cases[i]);
        reporter.caseCompleted(outcome);
      });
    }
    return report;
  };

  let report: SuiteReport;
  if (options.zip) {
    report = await withSubmission(
      options.zip,
      {
        ...config,
        keepTemp: options.keepTemp,
        onRetained: (dir) => reporter.warn(`Keeping extracted submission at ${dir}`),
      },
      async (source) => {
        reporter.success('Valid submission structure');
        reporter.info('Identifiers:');
        for (const id of source.identifiers) reporter.info(`  - ${id}`);

        reporter.header('BUILDING ANALYZER');
        reporter.info(`Running '${config.buildCommand.join(' ')}' in ${source.sourceDir}...`);
        const artifact = await buildAnalyzer(source.sourceDir, config);
        reporter.success('Build successful');
        return execute(artifact);
      },
    );
  } else {
    report = await execute(locateAnalyzer(config.analyzerDir, config));
  }

  const durationMs = Date.now() - startTime;
  reporter.summary(report, durationMs);

  if (options.output) {
    const outputPath = path.resolve(options.output);
    fs.writeFileSync(outputPath, JSON.stringify(toJsonReport(report, durationMs), null, 2));
    reporter.info(`\nReport written to: ${outputPath}`);
  }

  return report.failed > 0 ? EXIT_TESTS_FAILED : EXIT_OK;
}

async function checkCommand(
  archive: string,
  options: CheckCommandOptions,
  io: CliIO,
): Promise<number> {
  const config = loadConfig(options.config);
  const reporter = new ConsoleReporter({ color: io.color, write: io.out });

  const summary = await inspectArchive(archive, config);
  reporter.success('Archive structure validated:');
  reporter.info(`  ✓ ${config.manifestFile}`);
  reporter.info(`  ✓ ${config.sourceDir}/ directory with ${summary.sourceFileCount} files`);
  reporter.info(`  ✓ ${config.sourceDir}/${config.buildDescriptor}`);
  reporter.info('\n  Identifiers:');
  for (const id of summary.identifiers) reporter.info(`    - ${id}`);
  return EXIT_OK;
}

async function promptForIdentifiers(
  prompt: (question: string) => Promise<string>,
): Promise<string[]> {
  const ids: string[] = [];
  for (;;) {
    const answer = await prompt(`  ID ${ids.length + 1}: `);
    if (!answer) return ids;
    ids.push(answer);
  }
}

async function packCommand(
  sourceDir: string,
  options: PackCommandOptions,
  io: CliIO,
): Promise<number> {
  const config = loadConfig(options.config);
  const reporter = new ConsoleReporter({ color: io.color, write: io.out });
  const resolved = path.resolve(sourceDir);

  reporter.header('SUBMISSION ARCHIVE CREATOR');
  reporter.info(`Source directory: ${resolved}`);

  const check = validateSourceDir(resolved, config.buildDescriptor);
  if (!check.hasSourceFiles) {
    reporter.warn('No source files (.java, .py, .cpp, .c) found in directory');
  }

  let raw: string[] = options.ids ?? (options.id ? [options.id] : []);
  if (raw.length === 0 && io.prompt) {
    reporter.info('Enter identifiers (one per line, empty line to finish):');
    raw = await promptForIdentifiers(io.prompt);
  }

  const { valid, skipped } = parseIdentifiers(raw);
  for (const id of skipped) {
    reporter.warn(`ID '${id}' is not numeric, skipping`);
  }
  if (valid.length === 0) {
    throw new ConfigError('No valid identifiers provided');
  }
  reporter.info(`Identifiers: ${valid.join(', ')}`);

  const result = await createSubmission(resolved, valid, {
    ...config,
    outputDir: options.output,
    force: options.force,
  });

  reporter.success(`Created ${path.basename(result.archivePath)} with ${result.entries.length} entries`);
  reporter.success(`Archive structure validated (${result.sourceFileCount} files in ${config.sourceDir}/)`);
  reporter.header('SUBMISSION READY');
  reporter.info(`Archive: ${result.archivePath}`);
  reporter.info(`Size: ${(fs.statSync(result.archivePath).size / 1024).toFixed(1)} KB`);
  return EXIT_OK;
}

function reportFatal(error: unknown, io: CliIO): number {
  io.err(`Error: ${errorMessage(error)}`);
  if (error instanceof BuildError && error.output) {
    io.err('\nBuild output:');
    io.err(error.output);
  }
  return exitCodeFor(error);
}

export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();

  const wrap =
    <A extends unknown[]>(action: (...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      try {
        setExitCode(await action(...args));
      } catch (error) {
        setExitCode(reportFatal(error, io));
      }
    };

  program
    .exitOverride()
    .name('grader')
    .description(
      'Build analyzer submissions and verify them against a fixture corpus',
    )
    .version(VERSION)
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command('run')
    .description('Build the analyzer (or use a local build) and run the test corpus')
    .option('-z, --zip <archive>', 'Test a submission archive (.zip, .tar, .tar.gz)')
    .option('--analyzer-dir <dir>', 'Directory holding an already built analyzer')
    .option('--corpus <dir>', 'Root of the fixture corpus')
    .option('--category <name>', 'Run one category (e.g. global, unofficial/while)')
    .option('--official', 'Run only the official tests')
    .option('--unofficial', 'Run only the unofficial tests')
    .option('-f, --filter <substring>', 'Run only cases whose name contains this')
    .option('-v, --verbose', 'Show expected/actual diffs for failures')
    .option('--timeout <ms>', 'Per-case timeout in milliseconds', parsePositiveInt)
    .option('--build-timeout <ms>', 'Build timeout in milliseconds', parsePositiveInt)
    .option('-j, --jobs <n>', 'Run up to n cases at once', parsePositiveInt)
    .option('-o, --output <file>', 'Write a JSON report to file')
    .option('--keep-temp', 'Keep the extracted submission for debugging')
    .option('--dry-run', 'List selected tests without running them')
    .option('-c, --config <file>', 'Path to a grader config file')
    .action(wrap((options: RunCommandOptions) => runCommand(options, io)));

  program
    .command('check')
    .description('Validate the structure of a submission archive')
    .argument('<archive>', 'Path to the submission archive')
    .option('-c, --config <file>', 'Path to a grader config file')
    .action(
      wrap((archive: string, options: CheckCommandOptions) =>
        checkCommand(archive, options, io),
      ),
    );

  program
    .command('pack')
    .description('Create a submission archive from a source directory')
    .argument('<sourceDir>', 'Directory containing the Makefile and sources')
    .option('--id <id>', 'Single identifier')
    .option('--ids <ids...>', 'Multiple identifiers (team submission)')
    .option('-o, --output <dir>', 'Output directory (default: current directory)')
    .option('-f, --force', 'Overwrite an existing archive')
    .option('-c, --config <file>', 'Path to a grader config file')
    .action(
      wrap((sourceDir: string, options: PackCommandOptions) =>
        packCommand(sourceDir, options, io),
      ),
    );

  return program;
}

/** Parses user arguments and resolves with the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_FATAL;
    }
    throw error;
  }
  return exitCode;
}

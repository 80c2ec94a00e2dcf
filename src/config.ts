import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'grader.config.json';

const commandSchema = z.array(z.string().min(1)).min(1);

export const ConfigSchema = z
  .object({
    corpusDir: z.string().default('.'),
    analyzerDir: z.string().default('ex4'),

    manifestFile: z.string().min(1).default('ids.txt'),
    sourceDir: z.string().min(1).default('ex4'),
    buildDescriptor: z.string().min(1).default('Makefile'),
    buildCommand: commandSchema.default(['make']),
    executableName: z.string().min(1).default('ANALYZER'),

    launcher: z.array(z.string().min(1)).default(['java', '-jar']),
    inputMode: z.enum(['argument', 'stdin']).default('argument'),
    outputMode: z.enum(['file', 'stdout']).default('file'),

    testsDir: z.string().min(1).default('tests'),
    expectedDir: z.string().min(1).default('expected_output'),
    inputExtension: z.string().startsWith('.').default('.txt'),
    expectedSuffix: z.string().min(1).default('_Expected_Output'),
    categoryOrder: z.array(z.string()).default([]),

    timeoutMs: z.number().int().positive().default(10_000),
    buildTimeoutMs: z.number().int().positive().default(60_000),
    concurrency: z.number().int().positive().default(1),
  })
  .strict();

export type GraderConfig = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<GraderConfig>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Load configuration from an explicit file, or from grader.config.json in the
 * working directory when present. Overrides win over file values; anything
 * left unset falls back to the schema defaults.
 */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): GraderConfig {
  let fileValues: unknown = {};

  const resolved = configPath
    ? path.resolve(cwd, configPath)
    : path.join(cwd, DEFAULT_CONFIG_FILE);

  if (fs.existsSync(resolved)) {
    try {
      fileValues = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (e) {
      throw new ConfigError(
        `Invalid JSON in config file ${resolved}: ${errorMessage(e)}`,
      );
    }
  } else if (configPath) {
    throw new ConfigError(`Config file does not exist: ${resolved}`);
  }

  if (typeof fileValues !== 'object' || fileValues === null) {
    throw new ConfigError(`Config file must contain a JSON object: ${resolved}`);
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = ConfigSchema.safeParse({ ...fileValues, ...defined });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

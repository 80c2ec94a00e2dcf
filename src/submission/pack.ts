import AdmZip from 'adm-zip';
import * as fs from 'fs';
import * as path from 'path';
import type { ArchiveSummary } from '../types.js';
import { StructureError } from '../errors.js';
import { inspectArchive, type ArchiveLayout } from './archive.js';

/** Paths the Makefile needs; nothing else from the source directory is packed. */
export const DEFAULT_REQUIRED_PATHS = [
  'Makefile',
  'manifest',
  'jflex',
  'cup',
  'external_jars',
  'src',
];

export const DEFAULT_IGNORE_PATTERNS = [
  '*.class',
  '*.o',
  '*.so',
  '*.a',
  '__pycache__',
  '.git',
  '.gitignore',
  '*.swp',
  '*.swo',
  '.DS_Store',
];

const SOURCE_EXTENSIONS = ['.java', '.py', '.cpp', '.c'];

export interface PackOptions extends ArchiveLayout {
  executableName: string;
  outputDir?: string;
  force?: boolean;
  requiredPaths?: readonly string[];
  ignorePatterns?: readonly string[];
}

export interface PackResult extends ArchiveSummary {
  archivePath: string;
  entries: string[];
}

export interface SourceDirCheck {
  hasSourceFiles: boolean;
}

export interface ParsedIdentifiers {
  valid: string[];
  skipped: string[];
}

/** Splits identifiers into usable (numeric) and skipped ones. */
export function parseIdentifiers(values: readonly string[]): ParsedIdentifiers {
  const valid: string[] = [];
  const skipped: string[] = [];

  for (const value of values) {
    const id = value.trim();
    if (!id) continue;
    if (/^\d+$/.test(id)) {
      valid.push(id);
    } else {
      skipped.push(id);
    }
  }

  return { valid, skipped };
}

/** Supports exact names and `*.ext` suffix patterns. */
export function matchesIgnorePattern(
  name: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) =>
    pattern.startsWith('*') ? name.endsWith(pattern.slice(1)) : name === pattern,
  );
}

function hasSourceFiles(dir: string): boolean {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (hasSourceFiles(full)) return true;
    } else if (SOURCE_EXTENSIONS.includes(path.extname(entry.name))) {
      return true;
    }
  }
  return false;
}

export function validateSourceDir(
  dir: string,
  buildDescriptor: string,
): SourceDirCheck {
  if (!fs.existsSync(dir)) {
    throw new StructureError(`Directory does not exist: ${dir}`);
  }
  if (!fs.statSync(dir).isDirectory()) {
    throw new StructureError(`Path is not a directory: ${dir}`);
  }
  if (!fs.existsSync(path.join(dir, buildDescriptor))) {
    throw new StructureError(`${buildDescriptor} not found in ${dir}`);
  }
  return { hasSourceFiles: hasSourceFiles(dir) };
}

function addTree(
  zip: AdmZip,
  hostPath: string,
  entryPath: string,
  ignore: readonly string[],
  entries: string[],
): void {
  const stat = fs.statSync(hostPath);

  if (stat.isFile()) {
    zip.addFile(entryPath, fs.readFileSync(hostPath));
    entries.push(entryPath);
    return;
  }

  if (!stat.isDirectory()) return;

  const children = fs
    .readdirSync(hostPath)
    .filter((name) => !matchesIgnorePattern(name, ignore))
    .sort();
  for (const name of children) {
    addTree(zip, path.join(hostPath, name), `${entryPath}/${name}`, ignore, entries);
  }
}

/**
 * Writes `<firstId>.zip` holding the identifier manifest and the whitelisted
 * part of the source directory, then re-validates the result.
 */
export async function createSubmission(
  sourceDir: string,
  identifiers: readonly string[],
  options: PackOptions,
): Promise<PackResult> {
  if (identifiers.length === 0) {
    throw new StructureError('At least one identifier is required');
  }

  const outputDir = path.resolve(options.outputDir ?? process.cwd());
  fs.mkdirSync(outputDir, { recursive: true });
  const archivePath = path.join(outputDir, `${identifiers[0]}.zip`);

  if (fs.existsSync(archivePath) && !options.force) {
    throw new StructureError(
      `Archive already exists: ${archivePath} (use --force to overwrite)`,
    );
  }

  const required = new Set([
    options.buildDescriptor,
    ...(options.requiredPaths ?? DEFAULT_REQUIRED_PATHS),
  ]);
  const ignore = [
    ...(options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS),
    options.executableName,
  ];

  const zip = new AdmZip();
  const entries: string[] = [];

  const manifest = identifiers.map((id) => `${id}\n`).join('');
  zip.addFile(options.manifestFile, Buffer.from(manifest, 'utf-8'));
  entries.push(options.manifestFile);

  for (const relative of required) {
    const hostPath = path.join(sourceDir, relative);
    if (!fs.existsSync(hostPath)) continue;
    addTree(zip, hostPath, `${options.sourceDir}/${relative}`, ignore, entries);
  }

  zip.writeZip(archivePath);

  const summary = await inspectArchive(archivePath, options);
  return { ...summary, archivePath, entries };
}

import AdmZip from 'adm-zip';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar-stream';
import * as zlib from 'zlib';
import type { ArchiveSummary, SourceRoot } from '../types.js';
import { StructureError, errorMessage } from '../errors.js';

export interface ArchiveLayout {
  manifestFile: string;
  sourceDir: string;
  buildDescriptor: string;
}

export interface ExtractOptions extends ArchiveLayout {
  /** Leave the extraction directory on disk for debugging. */
  keepTemp?: boolean;
  onRetained?: (dir: string) => void;
}

type ArchiveFormat = 'zip' | 'tar' | 'tar.gz';

export function detectFormat(archivePath: string): ArchiveFormat | null {
  const lower = archivePath.toLowerCase();
  if (lower.endsWith('.zip')) return 'zip';
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) return 'tar.gz';
  if (lower.endsWith('.tar')) return 'tar';
  return null;
}

/** Resolves an entry name under `root`, refusing anything that escapes it. */
export function resolveEntryPath(root: string, entryName: string): string {
  const target = path.resolve(root, entryName);
  const relative = path.relative(root, target);
  if (
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new StructureError(`Archive entry escapes extraction root: ${entryName}`);
  }
  return target;
}

function extractZip(archivePath: string, dest: string): void {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (e) {
    throw new StructureError(
      `Not a valid zip file: ${archivePath} (${errorMessage(e)})`,
    );
  }

  for (const entry of zip.getEntries()) {
    resolveEntryPath(dest, entry.entryName);
  }

  zip.extractAllTo(dest, true);
}

async function extractTar(
  archivePath: string,
  dest: string,
  gzipped: boolean,
): Promise<void> {
  const extract = tar.extract();

  extract.on('entry', (header, stream, next) => {
    let target: string;
    try {
      target = resolveEntryPath(dest, header.name);
    } catch (error) {
      stream.resume();
      next(error);
      return;
    }

    if (header.type === 'directory') {
      fs.mkdirSync(target, { recursive: true });
      stream.on('end', () => next());
      stream.resume();
      return;
    }

    if (header.type !== 'file') {
      stream.on('end', () => next());
      stream.resume();
      return;
    }

    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('error', (error: Error) => next(error));
    stream.on('end', () => {
      try {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, Buffer.concat(chunks), { mode: header.mode });
        next();
      } catch (error) {
        next(error);
      }
    });
  });

  const source = fs.createReadStream(archivePath);
  try {
    await new Promise<void>((resolve, reject) => {
      const fail = (error: unknown) => {
        source.destroy();
        reject(error);
      };
      extract.on('finish', () => resolve());
      extract.on('error', fail);
      source.on('error', fail);

      if (gzipped) {
        source.pipe(zlib.createGunzip()).on('error', fail).pipe(extract);
      } else {
        source.pipe(extract);
      }
    });
  } catch (e) {
    if (e instanceof StructureError) throw e;
    throw new StructureError(
      `Not a valid tar archive: ${archivePath} (${errorMessage(e)})`,
    );
  }
}

export function readIdentifiers(manifestPath: string): string[] {
  return fs
    .readFileSync(manifestPath, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Checks an extracted submission. The first missing element wins:
 * manifest, then source directory, then build descriptor.
 */
export function validateLayout(
  root: string,
  layout: ArchiveLayout,
): Omit<SourceRoot, 'cleanup'> {
  const manifestPath = path.join(root, layout.manifestFile);
  if (!fs.existsSync(manifestPath) || !fs.statSync(manifestPath).isFile()) {
    throw new StructureError(`${layout.manifestFile} not found in archive`);
  }

  const identifiers = readIdentifiers(manifestPath);
  if (identifiers.length === 0) {
    throw new StructureError(`${layout.manifestFile} contains no identifiers`);
  }

  const sourceDir = path.join(root, layout.sourceDir);
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new StructureError(`${layout.sourceDir}/ directory not found in archive`);
  }

  const buildDescriptor = path.join(sourceDir, layout.buildDescriptor);
  if (!fs.existsSync(buildDescriptor)) {
    throw new StructureError(
      `${layout.sourceDir}/${layout.buildDescriptor} not found in archive`,
    );
  }

  return { root, sourceDir, buildDescriptor, identifiers };
}

/**
 * Extracts a submission into a new temporary directory and validates it.
 * On failure the directory is removed before the error propagates.
 */
export async function extractAndValidate(
  archivePath: string,
  options: ExtractOptions,
): Promise<SourceRoot> {
  const resolved = path.resolve(archivePath);
  if (!fs.existsSync(resolved)) {
    throw new StructureError(`Archive not found: ${resolved}`);
  }

  const format = detectFormat(resolved);
  if (!format) {
    throw new StructureError(
      `Unsupported archive type (expected .zip, .tar, .tar.gz or .tgz): ${resolved}`,
    );
  }

  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'grader-submission-'));
  const cleanup = () => {
    if (options.keepTemp) {
      options.onRetained?.(root);
      return;
    }
    fs.rmSync(root, { recursive: true, force: true });
  };

  try {
    if (format === 'zip') {
      extractZip(resolved, root);
    } else {
      await extractTar(resolved, root, format === 'tar.gz');
    }
    return { ...validateLayout(root, options), cleanup };
  } catch (error) {
    cleanup();
    throw error;
  }
}

/**
 * Scoped acquisition of an extracted submission: the temporary directory is
 * released once `fn` settles, whichever way it goes.
 */
export async function withSubmission<T>(
  archivePath: string,
  options: ExtractOptions,
  fn: (source: SourceRoot) => Promise<T>,
): Promise<T> {
  const source = await extractAndValidate(archivePath, options);
  try {
    return await fn(source);
  } finally {
    source.cleanup();
  }
}

export function countFiles(dir: string): number {
  let count = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      count += countFiles(path.join(dir, entry.name));
    } else if (entry.isFile()) {
      count += 1;
    }
  }
  return count;
}

/** Validates an archive's structure without keeping anything on disk. */
export async function inspectArchive(
  archivePath: string,
  layout: ArchiveLayout,
): Promise<ArchiveSummary> {
  return withSubmission(
    archivePath,
    { ...layout, keepTemp: false },
    async (source) => ({
      identifiers: [...source.identifiers],
      sourceFileCount: countFiles(source.sourceDir),
    }),
  );
}

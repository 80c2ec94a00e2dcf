import AdmZip from 'adm-zip';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { BuildArtifact, TestCase } from '../src/types.js';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));
export const CORPUS_DIR = path.join(FIXTURES_DIR, 'corpus');
export const FAKE_ANALYZER = path.join(FIXTURES_DIR, 'fake-analyzer.cjs');
export const FAKE_BUILD = path.join(FIXTURES_DIR, 'fake-build.cjs');

/** Runs .cjs stand-ins through the current node binary. */
export const NODE_LAUNCHER = [process.execPath];

export const DISCOVERY = {
  testsDir: 'tests',
  expectedDir: 'expected_output',
  inputExtension: '.txt',
  expectedSuffix: '_Expected_Output',
};

export function makeTempDir(prefix = 'grader-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function fakeArtifact(): BuildArtifact {
  return { executablePath: FAKE_ANALYZER, workDir: FIXTURES_DIR };
}

/** Writes a one-off test case (input program plus expected report) to disk. */
export function writeCase(
  dir: string,
  name: string,
  input: string,
  expected: string,
  category = 'adhoc',
): TestCase {
  const inputPath = path.join(dir, `${name}.txt`);
  const expectedPath = path.join(dir, `${name}_Expected_Output.txt`);
  fs.writeFileSync(inputPath, input);
  fs.writeFileSync(expectedPath, expected);
  return { category, name, inputPath, expectedPath, input, expected };
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function writeZip(zipPath: string, files: Record<string, string>): string {
  const zip = new AdmZip();
  for (const [entry, content] of Object.entries(files)) {
    zip.addFile(entry, Buffer.from(content, 'utf-8'));
  }
  zip.writeZip(zipPath);
  return zipPath;
}

/** Files of a submission whose build copies the fake analyzer into place. */
export function submissionFiles(extra: Record<string, string> = {}): Record<string, string> {
  return {
    'ids.txt': '123456789\n987654321\n',
    'ex4/Makefile': 'all:\n\tjava -version\n',
    'ex4/build.cjs': fs.readFileSync(FAKE_BUILD, 'utf-8'),
    'ex4/analyzer.cjs': fs.readFileSync(FAKE_ANALYZER, 'utf-8'),
    'ex4/src/Main.java': 'public class Main {}\n',
    ...extra,
  };
}

/**
 * True while `pid` is a live process. A zombie counts as dead: it has
 * exited and only waits for its parent to reap it. Reads /proc, so Linux only.
 */
export function isProcessAlive(pid: number): boolean {
  const statPath = `/proc/${pid}/stat`;
  if (!fs.existsSync(statPath)) return false;
  const stat = fs.readFileSync(statPath, 'utf-8');
  // The state field follows the parenthesised command name.
  const state = stat.slice(stat.lastIndexOf(')') + 2).charAt(0);
  return state !== 'Z' && state !== 'X';
}

export function readPid(pidPath: string): number {
  return Number(fs.readFileSync(pidPath, 'utf-8').trim());
}

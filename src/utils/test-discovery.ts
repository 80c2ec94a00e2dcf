import * as fs from 'fs';
import * as path from 'path';
import type { CaseFilter, Category, TestCase } from '../types.js';
import { FixtureError } from '../errors.js';

export interface DiscoveryOptions {
  testsDir: string;
  expectedDir: string;
  inputExtension: string;
  expectedSuffix: string;
  categoryOrder?: readonly string[];
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders category names: the ones listed in `preferred` come first, in that
 * order, and everything else follows sorted by name.
 */
export function orderCategories(
  names: readonly string[],
  preferred: readonly string[] = [],
): string[] {
  const rank = new Map(preferred.map((name, i) => [name, i]));
  return [...names].sort((a, b) => {
    const ra = rank.get(a);
    const rb = rank.get(b);
    if (ra !== undefined && rb !== undefined) return ra - rb;
    if (ra !== undefined) return -1;
    if (rb !== undefined) return 1;
    return byName(a, b);
  });
}

function findCategoryDirs(
  root: string,
  testsDir: string,
  relative: string[] = [],
): string[] {
  const dir = path.join(root, ...relative);
  const found: string[] = [];

  const testsPath = path.join(dir, testsDir);
  if (fs.existsSync(testsPath) && fs.statSync(testsPath).isDirectory()) {
    found.push(relative.join('/'));
  }

  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
    if (entry.name === testsDir || entry.name === 'node_modules') continue;
    found.push(...findCategoryDirs(root, testsDir, [...relative, entry.name]));
  }

  return found;
}

function loadCategory(
  corpusRoot: string,
  name: string,
  options: DiscoveryOptions,
): Category {
  const categoryDir =
    name === '.' ? corpusRoot : path.join(corpusRoot, ...name.split('/'));
  const testsPath = path.join(categoryDir, options.testsDir);
  const expectedPath = path.join(categoryDir, options.expectedDir);

  const inputs = fs
    .readdirSync(testsPath, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(options.inputExtension))
    .map((e) => e.name)
    .sort(byName);

  const cases: TestCase[] = inputs.map((fileName) => {
    const caseName = fileName.slice(0, -options.inputExtension.length);
    const inputPath = path.join(testsPath, fileName);
    const expectedFile = path.join(
      expectedPath,
      `${caseName}${options.expectedSuffix}${options.inputExtension}`,
    );

    if (!fs.existsSync(expectedFile)) {
      throw new FixtureError(
        `Expected output missing for ${name}/${caseName}: ${expectedFile}`,
      );
    }

    return Object.freeze({
      category: name,
      name: caseName,
      inputPath,
      expectedPath: expectedFile,
      input: fs.readFileSync(inputPath, 'utf-8'),
      expected: fs.readFileSync(expectedFile, 'utf-8'),
    });
  });

  return Object.freeze({ name, cases: Object.freeze(cases) });
}

/**
 * Scans a corpus root for categories. Any directory holding a tests/
 * subdirectory is a category named by its path relative to the root; the
 * root itself is named ".". Every input must have a matching expected output
 * file or the whole load fails.
 */
export function discoverCategories(
  corpusRoot: string,
  options: DiscoveryOptions,
): Category[] {
  if (!fs.existsSync(corpusRoot)) {
    throw new FixtureError(`Directory does not exist: ${corpusRoot}`);
  }

  const stat = fs.statSync(corpusRoot);
  if (!stat.isDirectory()) {
    throw new FixtureError(`Path is not a directory: ${corpusRoot}`);
  }

  const names = findCategoryDirs(corpusRoot, options.testsDir).map(
    (name) => name || '.',
  );

  return orderCategories(names, options.categoryOrder).map((name) =>
    loadCategory(corpusRoot, name, options),
  );
}

export function matchesCategory(categoryName: string, wanted: string): boolean {
  if (categoryName === wanted) return true;
  const segments = categoryName.split('/');
  return segments[segments.length - 1] === wanted;
}

/**
 * Narrows categories down to the cases a filter selects. Categories left
 * without cases are dropped; order is untouched.
 */
export function selectCases(
  categories: readonly Category[],
  filter: CaseFilter = {},
): Category[] {
  const selected: Category[] = [];

  for (const category of categories) {
    if (filter.group && category.name.split('/')[0] !== filter.group) continue;
    if (filter.category && !matchesCategory(category.name, filter.category)) {
      continue;
    }

    const nameFilter = filter.name;
    const cases = nameFilter
      ? category.cases.filter((c) => c.name.includes(nameFilter))
      : category.cases;

    if (cases.length > 0) {
      selected.push({ name: category.name, cases });
    }
  }

  return selected;
}

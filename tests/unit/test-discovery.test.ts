import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  discoverCategories,
  orderCategories,
  selectCases,
} from '../../src/utils/test-discovery.js';
import { FixtureError } from '../../src/errors.js';
import { CORPUS_DIR, DISCOVERY, makeTempDir, writeFiles } from '../helpers.js';
import * as fs from 'fs';
import * as path from 'path';

describe('discoverCategories', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('grader-discovery-');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('finds categories by relative path, sorted by name', () => {
    const categories = discoverCategories(CORPUS_DIR, DISCOVERY);

    expect(categories.map((c) => c.name)).toEqual([
      'official',
      'unofficial/global',
      'unofficial/if',
      'unofficial/ok',
      'unofficial/propagation',
      'unofficial/while',
    ]);
  });

  it('pairs each input with its expected output', () => {
    const categories = discoverCategories(CORPUS_DIR, DISCOVERY);
    const official = categories[0];

    expect(official.cases.map((c) => c.name)).toEqual([
      'TEST_01_Global_Uninit',
      'TEST_02_All_Initialized',
    ]);
    expect(official.cases[0].expected).toBe('g\n');
    expect(official.cases[1].expected).toBe('!OK\n');
    expect(official.cases[0].category).toBe('official');
    expect(path.isAbsolute(official.cases[0].inputPath)).toBe(true);
  });

  it('sorts cases by name regardless of creation order', () => {
    writeFiles(tempDir, {
      'loops/tests/c.txt': 'c',
      'loops/tests/a.txt': 'a',
      'loops/tests/b.txt': 'b',
      'loops/expected_output/a_Expected_Output.txt': '!OK\n',
      'loops/expected_output/b_Expected_Output.txt': '!OK\n',
      'loops/expected_output/c_Expected_Output.txt': '!OK\n',
    });

    const [loops] = discoverCategories(tempDir, DISCOVERY);

    expect(loops.cases.map((c) => c.name)).toEqual(['a', 'b', 'c']);
  });

  it('puts preferred categories first, in the given order', () => {
    const categories = discoverCategories(CORPUS_DIR, {
      ...DISCOVERY,
      categoryOrder: ['unofficial/while', 'official'],
    });

    expect(categories.map((c) => c.name)).toEqual([
      'unofficial/while',
      'official',
      'unofficial/global',
      'unofficial/if',
      'unofficial/ok',
      'unofficial/propagation',
    ]);
  });

  it('names a corpus root that is itself a category "."', () => {
    writeFiles(tempDir, {
      'tests/one.txt': 'int x;',
      'expected_output/one_Expected_Output.txt': 'x\n',
    });

    const categories = discoverCategories(tempDir, DISCOVERY);

    expect(categories).toHaveLength(1);
    expect(categories[0].name).toBe('.');
    expect(categories[0].cases[0].category).toBe('.');
  });

  it('ignores files with other extensions', () => {
    writeFiles(tempDir, {
      'misc/tests/one.txt': 'int x;',
      'misc/tests/notes.md': '# notes',
      'misc/expected_output/one_Expected_Output.txt': 'x\n',
    });

    const [misc] = discoverCategories(tempDir, DISCOVERY);

    expect(misc.cases.map((c) => c.name)).toEqual(['one']);
  });

  it('fails at load time when an expected output is missing', () => {
    writeFiles(tempDir, {
      'broken/tests/lonely.txt': 'int x;',
      'broken/expected_output/.keep': '',
    });

    expect(() => discoverCategories(tempDir, DISCOVERY)).toThrow(FixtureError);
    expect(() => discoverCategories(tempDir, DISCOVERY)).toThrow(/lonely/);
  });

  it('throws if directory does not exist', () => {
    const nonExistentDir = path.join(tempDir, 'does-not-exist');

    expect(() => discoverCategories(nonExistentDir, DISCOVERY)).toThrow(
      /does not exist/,
    );
  });

  it('returns no categories for a directory without tests', () => {
    fs.writeFileSync(path.join(tempDir, 'readme.txt'), 'No tests here');

    expect(discoverCategories(tempDir, DISCOVERY)).toEqual([]);
  });
});

describe('orderCategories', () => {
  it('breaks ties by name', () => {
    expect(orderCategories(['while', 'if', 'global'])).toEqual([
      'global',
      'if',
      'while',
    ]);
  });
});

describe('selectCases', () => {
  const categories = discoverCategories(CORPUS_DIR, DISCOVERY);

  it('returns everything without a filter', () => {
    expect(selectCases(categories)).toHaveLength(6);
  });

  it('matches a category by its last path segment', () => {
    const selected = selectCases(categories, { category: 'while' });

    expect(selected.map((c) => c.name)).toEqual(['unofficial/while']);
    expect(selected[0].cases).toHaveLength(2);
  });

  it('matches a category by its full name', () => {
    const selected = selectCases(categories, { category: 'unofficial/if' });

    expect(selected.map((c) => c.name)).toEqual(['unofficial/if']);
  });

  it('restricts to a group', () => {
    const selected = selectCases(categories, { group: 'official' });

    expect(selected.map((c) => c.name)).toEqual(['official']);
  });

  it('filters cases by name substring and drops empty categories', () => {
    const selected = selectCases(categories, { name: 'body_init' });

    expect(selected.map((c) => c.name)).toEqual([
      'unofficial/if',
      'unofficial/while',
    ]);
    expect(selected.flatMap((c) => c.cases.map((t) => t.name))).toEqual([
      'if_body_init',
      'while_body_init',
    ]);
  });
});

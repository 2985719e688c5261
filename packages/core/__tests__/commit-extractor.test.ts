import { describe, it, expect, vi } from 'vitest';
import { createFakeGit } from './helpers/fake-git.js';

// ── Fixtures ─────────────────────────────────────────────────────────────────

const COMPAT = 'int printf(const char *fmt, ...) {\n    return 0;\n}\n';

const IO_BEFORE = [
  'void dangerous_function(char *buf) {',
  '    gets(buf);',
  '}',
  '',
  'void safe_function(char *buf) {',
  '    fgets(buf, 64, 0);',
  '}',
  '',
  'void handle(char *buf) {',
  '    dangerous_function(buf);',
  '    printf("%s", buf);',
  '}',
  '',
].join('\n');

const IO_AFTER = IO_BEFORE.replace('    dangerous_function(buf);', '    safe_function(buf);');

const TEST_BEFORE = 'void test_handle(void) {\n    handle(0);\n}\n';
const TEST_AFTER = 'void test_handle(void) {\n    handle("x");\n}\n';

// ── Mocks ────────────────────────────────────────────────────────────────────

const fakeGit = createFakeGit({
  commits: {
    fix1234: 'fix1234full parent0',
    root000: 'root000',
  },
  trees: {
    parent0: {
      'README.md': 'old\n',
      'src/compat.c': COMPAT,
      'src/io.c': IO_BEFORE,
      'tests/test_io.c': TEST_BEFORE,
    },
    fix1234full: {
      'README.md': 'new\n',
      'src/compat.c': COMPAT,
      'src/io.c': IO_AFTER,
      'tests/test_io.c': TEST_AFTER,
    },
  },
});

vi.mock('simple-git', () => ({
  simpleGit: vi.fn(() => fakeGit),
}));

import { GrammarRegistry } from '../src/parsing/grammar-registry.js';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  extractChangedFunctions,
  extractCommitFunctions,
} from '../src/extract/commit-extractor.js';
import { NoParentCommitError } from '../src/errors.js';
import type { FileChange } from '../src/types.js';

const registry = new GrammarRegistry();

const limits = {
  repoUrl: 'https://example.com/acme/netlib',
  maxFunctionLines: DEFAULT_EXTRACTION_OPTIONS.maxFunctionLines,
  maxChangedLines: DEFAULT_EXTRACTION_OPTIONS.maxChangedLines,
};

function change(contentBefore: string, contentAfter: string): FileChange {
  return { filePath: 'src/io.c', status: 'modified', language: 'c', contentBefore, contentAfter };
}

describe('extractChangedFunctions', () => {
  it('returns the functions whose code changed, with before/after and diff', () => {
    const [result, ...rest] = extractChangedFunctions(registry, change(IO_BEFORE, IO_AFTER), limits, 'fix1234');

    expect(rest).toEqual([]);
    expect(result.functionName).toBe('handle');
    expect(result.repoUrl).toBe('https://example.com/acme/netlib');
    expect(result.commitHash).toBe('fix1234');
    expect(result.filePath).toBe('src/io.c');
    expect(result.language).toBe('c');
    expect(result.before).toEqual({
      name: 'handle',
      signature: '(char *buf)',
      returnType: 'void',
      code: 'void handle(char *buf) {\n    dangerous_function(buf);\n    printf("%s", buf);\n}',
      startLine: 9,
      endLine: 12,
    });
    expect(result.after.code).toBe(
      'void handle(char *buf) {\n    safe_function(buf);\n    printf("%s", buf);\n}',
    );
    expect(result.diffStat).toEqual({
      addedLines: ['    safe_function(buf);'],
      deletedLines: ['    dangerous_function(buf);'],
    });
    expect(result.diffText.split('\n').slice(0, 3)).toEqual(['--- before', '+++ after', '@@ -1,4 +1,4 @@']);
    expect(result.callAnalysis).toBeUndefined();
  });

  it('skips functions that exist on one side only', () => {
    const before = 'int old_only(void) {\n    return 0;\n}\n';
    const after = 'int new_only(void) {\n    return 1;\n}\n';

    expect(extractChangedFunctions(registry, change(before, after), limits, 'c1')).toEqual([]);
  });

  it('skips functions that only moved', () => {
    const before = 'int a(void) {\n    return 0;\n}\n';
    const after = '\n\n\nint a(void) {\n    return 0;\n}\n';

    expect(extractChangedFunctions(registry, change(before, after), limits, 'c1')).toEqual([]);
  });

  it('skips functions longer than the line limit on either side', () => {
    const results = extractChangedFunctions(
      registry,
      change(IO_BEFORE, IO_AFTER),
      { ...limits, maxFunctionLines: 3 },
      'c1',
    );

    expect(results).toEqual([]);
  });

  it('skips changes larger than the changed-line limit', () => {
    const results = extractChangedFunctions(
      registry,
      change(IO_BEFORE, IO_AFTER),
      { ...limits, maxChangedLines: 1 },
      'c1',
    );

    expect(results).toEqual([]);
  });

  it('keeps a change exactly at the changed-line limit', () => {
    const results = extractChangedFunctions(
      registry,
      change(IO_BEFORE, IO_AFTER),
      { ...limits, maxChangedLines: 2 },
      'c1',
    );

    expect(results.map((r) => r.functionName)).toEqual(['handle']);
  });
});

describe('extractCommitFunctions', () => {
  it('extracts changed functions and attaches their call analysis', async () => {
    const results = await extractCommitFunctions(
      { repoPath: '/repo', repoUrl: 'https://example.com/acme/netlib', commit: 'fix1234' },
      registry,
    );

    expect(results.map((r) => `${r.filePath}:${r.functionName}`)).toEqual(['src/io.c:handle']);

    const [handle] = results;
    expect(handle.commitHash).toBe('fix1234');

    const changes = handle.callAnalysis?.changes;
    expect(changes?.addedCallees.map((c) => c.name)).toEqual(['safe_function']);
    expect(changes?.removedCallees.map((c) => c.name)).toEqual(['dangerous_function']);
    expect(changes?.unchangedCallees.map((c) => c.name)).toEqual(['printf']);
    expect(changes?.unchangedCallees[0].filePath).toBe('src/compat.c');
    // test files are excluded from extraction, not from the call graph
    expect(changes?.unchangedCallers.map((c) => c.name)).toEqual(['test_handle']);
    expect(changes?.unchangedCallers[0].filePath).toBe('tests/test_io.c');
  });

  it('includes test files when skipTests is off', async () => {
    const results = await extractCommitFunctions(
      { repoPath: '/repo', commit: 'fix1234', skipTests: false, callAnalysis: false },
      registry,
    );

    expect(results.map((r) => r.functionName)).toEqual(['handle', 'test_handle']);
    expect(results.every((r) => r.repoUrl === '')).toBe(true);
  });

  it('skips call analysis when disabled', async () => {
    const results = await extractCommitFunctions(
      { repoPath: '/repo', commit: 'fix1234', callAnalysis: false },
      registry,
    );

    expect(results).toHaveLength(1);
    expect(results[0].callAnalysis).toBeUndefined();
  });

  it('reports progress while it works', async () => {
    const onProgress = vi.fn();

    await extractCommitFunctions({ repoPath: '/repo', commit: 'fix1234', onProgress }, registry);

    expect(onProgress.mock.calls.map(([message]) => message)).toEqual([
      'Collecting changed files...',
      'Parsing src/io.c...',
      'Analyzing function calls before fix1234full...',
      'Analyzing function calls at fix1234full...',
    ]);
  });

  it('rejects a root commit', async () => {
    await expect(
      extractCommitFunctions({ repoPath: '/repo', commit: 'root000' }, registry),
    ).rejects.toThrow(NoParentCommitError);
  });
});

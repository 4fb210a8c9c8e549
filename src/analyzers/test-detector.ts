import { extensionOf } from '../filters/file-filter.js';
import type { TestMetrics } from '../types.js';

const TEST_DIRS = new Set([
  'test', 'tests', '__tests__', 'spec', 'specs', 'testing', 'test_unit', 'test_integration',
]);

const TEST_NAME_FRAGMENTS = ['test_', '_test', 'test.', '.test.', 'spec.', '.spec.', '_spec'];

const TEST_SUFFIXES = [
  '_test.py', '_test.js', '_test.ts', '_test.go', '_spec.rb',
  '.test.js', '.test.ts', '.test.jsx', '.test.tsx',
  '.spec.js', '.spec.ts', '.spec.jsx', '.spec.tsx',
  'test.java', 'tests.java', 'test.kt', 'tests.kt', 'test.swift',
];

const SOURCE_EXTENSIONS = new Set([
  '.py', '.js', '.ts', '.jsx', '.tsx', '.vue',
  '.java', '.kt', '.scala', '.swift', '.m', '.mm', '.dart',
  '.c', '.cpp', '.cc', '.cxx', '.h', '.hpp', '.cs',
  '.go', '.rs', '.rb', '.php', '.lua', '.pl', '.r',
]);

/**
 * Naming and location heuristics for test files. Matching is on the
 * lower-cased relative path; any segment containing "test" below the root
 * counts, which also catches names such as `latest.ts`.
 */
export function isTestFile(file: string): boolean {
  const segments = file.toLowerCase().split('/');
  const name = segments[segments.length - 1] ?? '';

  if (segments.some(seg => TEST_DIRS.has(seg))) return true;
  if (TEST_NAME_FRAGMENTS.some(fragment => name.includes(fragment))) return true;
  if (TEST_SUFFIXES.some(suffix => name.endsWith(suffix))) return true;

  return segments.length > 1 && segments.some(seg => seg.includes('test'));
}

export function isSourceFile(file: string): boolean {
  return SOURCE_EXTENSIONS.has(extensionOf(file));
}

export function findTestFiles(files: readonly string[]): Set<string> {
  return new Set(files.filter(isTestFile));
}

export function detectTests(files: readonly string[]): TestMetrics {
  let testCount = 0;
  let sourceCount = 0;

  for (const file of files) {
    if (isTestFile(file)) testCount++;
    else if (isSourceFile(file)) sourceCount++;
  }

  const ratio = sourceCount > 0 ? testCount / sourceCount : 0;

  return {
    hasTests:        testCount > 0,
    testFileCount:   testCount,
    sourceFileCount: sourceCount,
    testRatio:       Math.round(ratio * 1000) / 1000,
  };
}

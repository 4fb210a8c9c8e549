import { hasBinaryExtension } from '../filters/file-filter.js';
import { directoryDepth } from '../scoring/hotspot-detector.js';
import type { ComplexityMetrics, LargestFile } from '../types.js';

const DEEP_NESTING_THRESHOLD = 6;
const LARGEST_FILES_LIMIT = 10;

/**
 * Filesystem-only complexity signals: average size, deepest directory and
 * the largest files. Binary and empty files are left out.
 */
export function analyzeComplexity(
  files: readonly string[],
  sizes: ReadonlyMap<string, number>,
  binaryFiles: ReadonlySet<string> = new Set()
): ComplexityMetrics {
  const measured: LargestFile[] = [];
  let totalSize = 0;
  let maxDepth = 0;

  for (const filePath of files) {
    const sizeBytes = sizes.get(filePath);
    if (sizeBytes === undefined || sizeBytes === 0) continue;
    if (hasBinaryExtension(filePath) || binaryFiles.has(filePath)) continue;

    measured.push({ filePath, sizeBytes });
    totalSize += sizeBytes;
    maxDepth = Math.max(maxDepth, nestingDepth(filePath));
  }

  const largestFiles = [...measured]
    .sort((a, b) => b.sizeBytes - a.sizeBytes)
    .slice(0, LARGEST_FILES_LIMIT);

  return {
    avgFileSize:        measured.length > 0 ? totalSize / measured.length : 0,
    maxDirectoryDepth:  maxDepth,
    largestFiles,
    deepNestingWarning: maxDepth >= DEEP_NESTING_THRESHOLD,
  };
}

// Levels below the first directory: `a.ts` and `src/a.ts` are both 0, `src/x/a.ts` is 1.
function nestingDepth(filePath: string): number {
  return Math.max(0, directoryDepth(filePath) - 1);
}

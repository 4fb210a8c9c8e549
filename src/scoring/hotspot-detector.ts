import { roundOneDecimal } from './math.js';
import type { RiskHotspot } from '../types.js';

const WEIGHTS = {
  loc:     0.4,
  depth:   0.3,
  noTests: 0.3,
} as const;

const LOC_THRESHOLDS = {
  HIGH:   500,
  MEDIUM: 200,
} as const;

const DEPTH_THRESHOLDS = {
  HIGH:   4,
  NESTED: 3,
} as const;

/** Files scoring at or below this are not hotspots at all. */
const INCLUSION_FLOOR = 30;

const TEST_DIR_NAMES = ['tests', '__tests__'] as const;

export const DEFAULT_MAX_HOTSPOTS = 10;

export interface HotspotOptions {
  maxResults?: number;
  /**
   * Whether a directory (relative to the scan root) exists on disk.
   * Defaults to assuming every candidate directory exists.
   */
  directoryExists?: (relativeDir: string) => boolean;
}

/**
 * Ranks analyzed files by a weighted blend of size, nesting depth and the
 * absence of nearby tests. Test files themselves are never hotspots.
 *
 * Paths are relative to the scan root and `/`-separated. The result is
 * sorted by risk score, descending; equal scores keep encounter order.
 */
export function detectHotspots(
  lineCounts: ReadonlyMap<string, number>,
  testFiles: ReadonlySet<string>,
  options: HotspotOptions = {}
): RiskHotspot[] {
  const maxResults      = options.maxResults ?? DEFAULT_MAX_HOTSPOTS;
  const directoryExists = options.directoryExists ?? (() => true);
  const testDirs        = new Set([...testFiles].map(parentDir));

  const hotspots: RiskHotspot[] = [];

  for (const [filePath, loc] of lineCounts) {
    if (testFiles.has(filePath)) continue;

    const depth          = directoryDepth(filePath);
    const hasNearbyTests = testDirs.has(parentDir(filePath))
      || hasTestDirectoryNearby(filePath, testFiles, directoryExists);
    const riskScore      = calculateRiskScore(loc, depth, hasNearbyTests);

    if (riskScore <= INCLUSION_FLOOR) continue;

    hotspots.push({
      filePath,
      riskScore,
      linesOfCode: loc,
      depth,
      hasNearbyTests,
      reason: describeRisk(loc, depth, hasNearbyTests),
    });
  }

  return hotspots
    .sort((a, b) => b.riskScore - a.riskScore)
    .slice(0, maxResults);
}

export function calculateRiskScore(loc: number, depth: number, hasNearbyTests: boolean): number {
  const locScore   = locSubScore(loc);
  const depthScore = Math.min(100, (depth / DEPTH_THRESHOLDS.HIGH) * 100);
  const testScore  = hasNearbyTests ? 0 : 100;

  return roundOneDecimal(
    WEIGHTS.loc     * locScore   +
    WEIGHTS.depth   * depthScore +
    WEIGHTS.noTests * testScore
  );
}

export function describeRisk(loc: number, depth: number, hasNearbyTests: boolean): string {
  const reasons: string[] = [];

  if (loc > LOC_THRESHOLDS.HIGH) {
    reasons.push(`Very large file (${loc} LOC)`);
  } else if (loc > LOC_THRESHOLDS.MEDIUM) {
    reasons.push(`Large file (${loc} LOC)`);
  }

  if (depth >= DEPTH_THRESHOLDS.HIGH) {
    reasons.push(`Deeply nested (depth ${depth})`);
  } else if (depth >= DEPTH_THRESHOLDS.NESTED) {
    reasons.push(`Nested structure (depth ${depth})`);
  }

  if (!hasNearbyTests) reasons.push('No nearby tests');

  return reasons.length > 0 ? reasons.join(', ') : 'Potential complexity';
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

// Piecewise linear: 0–200 LOC → 0–50, 200–500 → 50–100, beyond → 100.
function locSubScore(loc: number): number {
  if (loc >= LOC_THRESHOLDS.HIGH) return 100;
  if (loc >= LOC_THRESHOLDS.MEDIUM) {
    return 50 + (loc - LOC_THRESHOLDS.MEDIUM) * 50 / (LOC_THRESHOLDS.HIGH - LOC_THRESHOLDS.MEDIUM);
  }
  return loc * 50 / LOC_THRESHOLDS.MEDIUM;
}

export function directoryDepth(filePath: string): number {
  return Math.max(0, filePath.split('/').length - 1);
}

function parentDir(filePath: string): string {
  const idx = filePath.lastIndexOf('/');
  return idx === -1 ? '' : filePath.slice(0, idx);
}

// Looks for a `tests/` or `__tests__/` directory beside each ancestor, from
// the scan root down to the file's grandparent, holding a known test file.
function hasTestDirectoryNearby(
  filePath: string,
  testFiles: ReadonlySet<string>,
  directoryExists: (relativeDir: string) => boolean
): boolean {
  const ancestors = filePath.split('/').slice(0, -1);

  for (let i = 0; i < ancestors.length; i++) {
    const base = ancestors.slice(0, i).join('/');
    for (const name of TEST_DIR_NAMES) {
      const testDir = base ? `${base}/${name}` : name;
      if (!directoryExists(testDir)) continue;
      const prefix = `${testDir}/`;
      for (const testFile of testFiles) {
        if (testFile.startsWith(prefix)) return true;
      }
    }
  }

  return false;
}

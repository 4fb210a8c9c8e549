import type { Grade, RiskLevel, OnboardingDifficulty } from './scoring/classifications.js';

export type { Grade, RiskLevel, OnboardingDifficulty };

// ─── Configuration ────────────────────────────────────────────────────────────

export interface ScanConfig {
  root: string;
  detectGit: boolean;
  intelligence: boolean;
  useCache: boolean;
  clearCache: boolean;
  maxHotspots: number;
}

// ─── Walker Output ────────────────────────────────────────────────────────────

export interface CacheStats {
  enabled: boolean;
  hits: number;
  misses: number;
  totalFiles: number;
  timeSavedEstimate: number;
  hitRate: number;
}

export interface DirectoryCount {
  directory: string;
  fileCount: number;
}

/** Paths are relative to the scan root, `/`-separated. */
export interface WalkResult {
  files: string[];
  lineCounts: Map<string, number>;
  sizes: Map<string, number>;
  binaryFiles: Set<string>;
  totalFiles: number;
  totalLines: number;
  languages: Record<string, number>;
  largestDirs: DirectoryCount[];
}

// ─── Collaborator Signals ─────────────────────────────────────────────────────

export interface LargestFile {
  filePath: string;
  sizeBytes: number;
}

export interface ComplexityMetrics {
  avgFileSize: number;
  maxDirectoryDepth: number;
  /** At most 10, descending by size. */
  largestFiles: LargestFile[];
  deepNestingWarning: boolean;
}

export interface TestMetrics {
  hasTests: boolean;
  testFileCount: number;
  sourceFileCount: number;
  /** testFileCount / sourceFileCount, or 0 when there are no sources. */
  testRatio: number;
}

export interface GitMetrics {
  commitCount: number;
  contributorCount: number;
  daysSinceLastCommit: number | null;
  isGitRepo: boolean;
}

export interface DependencyInfo {
  ecosystem: string;
  manifestFile: string;
  dependencyCount: number;
  dependencies: string[];
}

export interface Commit {
  hash: string;
  author: string;
  timestamp: number;
  subject: string;
}

// ─── Scoring ──────────────────────────────────────────────────────────────────

export interface RiskHotspot {
  filePath: string;
  riskScore: number;
  linesOfCode: number;
  depth: number;
  hasNearbyTests: boolean;
  reason: string;
}

export interface ScoreBreakdown {
  complexity: number;
  tests: number;
  gitActivity: number;
  hotspots: number;
  structure: number;
  overall: number;
}

export interface CodeHealthScore {
  maintainabilityGrade: Grade;
  riskLevel: RiskLevel;
  onboardingDifficulty: OnboardingDifficulty;
  scoreBreakdown: ScoreBreakdown;
}

export interface HealthInput {
  complexity: ComplexityMetrics;
  tests: TestMetrics;
  git: GitMetrics;
  hotspots: readonly RiskHotspot[];
  totalFiles: number;
  totalLines: number;
}

// ─── CI Gate ──────────────────────────────────────────────────────────────────

export interface CIThresholds {
  minGrade?: Grade;
  maxRisk?: RiskLevel;
  maxOnboarding?: OnboardingDifficulty;
}

export interface CIResult {
  passed: boolean;
  thresholds: CIThresholds;
  actualGrade: Grade | null;
  actualRisk: RiskLevel | null;
  actualOnboarding: OnboardingDifficulty | null;
  failures: string[];
}

// ─── Report ───────────────────────────────────────────────────────────────────

export interface AnalysisResult {
  repoName: string;
  totalFiles: number;
  totalLines: number;
  languages: Record<string, number>;
  largestDirs: DirectoryCount[];
  scanTime: number;
  complexity: ComplexityMetrics | null;
  hotspots: RiskHotspot[];
  dependencies: DependencyInfo[];
  testMetrics: TestMetrics | null;
  gitMetrics: GitMetrics | null;
  healthScore: CodeHealthScore | null;
  cacheStats: CacheStats | null;
}

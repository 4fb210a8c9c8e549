export { VERSION } from './version.js';
export { InvalidClassificationError } from './errors.js';

export {
  GRADES,
  RISK_LEVELS,
  ONBOARDING_DIFFICULTIES,
  Grades,
  RiskLevels,
  OnboardingDifficulties,
  type OrderedScale,
} from './scoring/classifications.js';
export { detectHotspots, calculateRiskScore, describeRisk, DEFAULT_MAX_HOTSPOTS } from './scoring/hotspot-detector.js';
export { scoreHealth, scoreToGrade, breakdownToRecord, COMPONENT_WEIGHTS } from './scoring/health-scorer.js';
export {
  evaluateThresholds,
  parseThresholds,
  hasThresholds,
  ciExitCode,
  ciResultToJson,
  EXIT_CODES,
  type CIResultJson,
  type RawThresholds,
} from './scoring/ci-thresholds.js';

export { analyzeCodebase, type AnalyzeHooks } from './scan/analyzer.js';
export { walkCodebase } from './scan/walker.js';
export { MetadataCache } from './scan/cache.js';

export { toJsonDocument, type JsonObject, type JsonValue } from './reporters/json.js';
export {
  markdownSummary,
  compactSummary,
  healthBlock,
  jsonSummary,
  generateBadges,
  isCiEnvironment,
} from './reporters/markdown.js';
export { injectHealthBlock, DEFAULT_MARKERS, type InjectResult, type Markers } from './reporters/readme-inject.js';

export type {
  AnalysisResult,
  CacheStats,
  CIResult,
  CIThresholds,
  CodeHealthScore,
  ComplexityMetrics,
  DependencyInfo,
  GitMetrics,
  Grade,
  HealthInput,
  OnboardingDifficulty,
  RiskHotspot,
  RiskLevel,
  ScanConfig,
  ScoreBreakdown,
  TestMetrics,
} from './types.js';

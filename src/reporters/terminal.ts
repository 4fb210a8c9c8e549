import chalk, { type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import { breakdownToRecord } from '../scoring/health-scorer.js';
import type { AnalysisResult, CIResult, Grade } from '../types.js';

const GRADE_CHALK: Record<Grade, ChalkInstance> = {
  A: chalk.green.bold,
  B: chalk.green.bold,
  C: chalk.yellow.bold,
  D: chalk.hex('#ff8800').bold,
  E: chalk.hex('#ff8800').bold,
  F: chalk.red.bold,
};

const TABLE_CHARS = {
  top: '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
  bottom: '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
  left: '│', 'left-mid': '├', mid: '─', 'mid-mid': '┼',
  right: '│', 'right-mid': '┤', middle: '│',
};

export function reportTerminal(result: AnalysisResult): void {
  console.log('');
  console.log(
    chalk.bold.cyan('🩺 codevitals') +
    chalk.gray(` — ${result.repoName}`) +
    chalk.gray(` (${fmt(result.totalFiles)} files, ${fmt(result.totalLines)} lines)`)
  );
  console.log('');

  printOverview(result);

  if (result.healthScore) {
    printHealth(result);
    printComplexity(result);
    printTests(result);
    printDependencies(result);
    printGit(result);
    printHotspots(result);
  }

  printScanTime(result);
}

export function reportCiSummary(result: AnalysisResult, ci: CIResult): void {
  console.log('');
  console.log(chalk.bold.cyan('═══ CI Analysis Summary ═══'));
  console.log('');
  console.log(`${chalk.gray('Repository:')} ${result.repoName}`);
  console.log(`${chalk.gray('Files:')} ${fmt(result.totalFiles)}  ${chalk.gray('Lines:')} ${fmt(result.totalLines)}`);
  console.log('');

  const health = result.healthScore;
  if (health) {
    console.log(chalk.bold('Code Health:'));
    console.log(`  Grade: ${GRADE_CHALK[health.maintainabilityGrade](health.maintainabilityGrade)}`);
    console.log(`  Risk Level: ${health.riskLevel}`);
    console.log(`  Onboarding: ${health.onboardingDifficulty}`);
    console.log('');
  }

  const { minGrade, maxRisk, maxOnboarding } = ci.thresholds;
  if (minGrade || maxRisk || maxOnboarding) {
    console.log(chalk.bold('Thresholds:'));
    if (minGrade)      console.log(`  Minimum Grade: ${minGrade}`);
    if (maxRisk)       console.log(`  Maximum Risk: ${maxRisk}`);
    if (maxOnboarding) console.log(`  Maximum Onboarding: ${maxOnboarding}`);
    console.log('');
  }

  if (ci.passed) {
    console.log(chalk.bold.green('✓ All thresholds passed'));
  } else {
    console.log(chalk.bold.red('✗ Threshold violations:'));
    for (const failure of ci.failures) console.log(`  ${chalk.white('•')} ${failure}`);
  }
  console.log('');
}

// ─── Sections ─────────────────────────────────────────────────────────────────

function printOverview(result: AnalysisResult): void {
  const table = new Table({
    head: [chalk.bold.gray('📊 OVERVIEW'), chalk.bold.gray('')],
    colWidths: [32, 24],
    style: { head: [], border: ['gray'] },
    chars: TABLE_CHARS,
  });

  table.push(['Repository', result.repoName]);
  table.push(['Total Files', fmt(result.totalFiles)]);
  table.push(['Total Lines', fmt(result.totalLines)]);

  const languages = Object.entries(result.languages).sort((a, b) => b[1] - a[1]).slice(0, 5);
  if (languages.length > 0) {
    table.push([chalk.bold('Languages'), '']);
    for (const [name, pct] of languages) table.push([`  ${name}`, `${pct.toFixed(1)}%`]);
  }

  const dirs = result.largestDirs.slice(0, 5);
  if (dirs.length > 0) {
    table.push([chalk.bold('Largest Directories'), '']);
    for (const d of dirs) table.push([`  ${truncatePath(d.directory, 28)}`, `${d.fileCount} files`]);
  }

  console.log(table.toString());
  console.log('');
}

function printHealth(result: AnalysisResult): void {
  const health = result.healthScore;
  if (!health) return;

  const grade = health.maintainabilityGrade;
  console.log(chalk.bold.green('💊 Code Health'));
  console.log(`   Grade:      ${GRADE_CHALK[grade](grade)}`);
  console.log(`   Risk Level: ${health.riskLevel}`);
  console.log(`   Onboarding: ${health.onboardingDifficulty}`);
  console.log('');

  const components = Object.entries(breakdownToRecord(health.scoreBreakdown))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [name, score] of components) {
    console.log(
      `   ${name.padEnd(13)} ${scoreChalk(score)(score.toFixed(1).padStart(5))}/100 ` +
      chalk.gray('[') + makeBar(score) + chalk.gray(']')
    );
  }
  console.log('');
}

function printComplexity(result: AnalysisResult): void {
  const complexity = result.complexity;
  if (!complexity) return;

  console.log(chalk.bold.blue('🔄 Complexity Signals'));
  console.log(`   Avg File Size: ${complexity.avgFileSize.toFixed(1)} bytes`);
  console.log(`   Max Depth:     ${complexity.maxDirectoryDepth} levels`);

  if (complexity.largestFiles.length > 0) {
    console.log(chalk.bold('   Largest Files:'));
    for (const file of complexity.largestFiles.slice(0, 5)) {
      console.log(`     • ${truncatePath(file.filePath, 60)} ${chalk.gray(`(${(file.sizeBytes / 1024).toFixed(1)} KB)`)}`);
    }
  }
  if (complexity.deepNestingWarning) {
    console.log(chalk.yellow('   ⚠️  Deep directory nesting detected'));
  }
  console.log('');
}

function printTests(result: AnalysisResult): void {
  const tests = result.testMetrics;
  if (!tests) return;

  console.log(chalk.bold.cyan('🧪 Test Coverage'));
  if (!tests.hasTests) {
    console.log(chalk.yellow('   ⚠️  No tests detected'));
    console.log('');
    return;
  }

  const ratioColor = tests.testRatio >= 0.3 ? chalk.green : tests.testRatio >= 0.1 ? chalk.yellow : chalk.red;
  const inverse = tests.testRatio > 0 ? `(1:${(1 / tests.testRatio).toFixed(1)})` : '(0:∞)';

  console.log(`   Test Files:   ${tests.testFileCount}`);
  console.log(`   Source Files: ${tests.sourceFileCount}`);
  console.log(`   Test Ratio:   ${ratioColor(`${(tests.testRatio * 100).toFixed(1)}%`)} ${chalk.gray(inverse)}`);
  console.log('');
}

function printDependencies(result: AnalysisResult): void {
  console.log(chalk.bold.magenta('📦 Dependencies'));
  if (result.dependencies.length === 0) {
    console.log(chalk.gray('   No dependency manifests found'));
    console.log('');
    return;
  }

  for (const dep of result.dependencies) {
    console.log(`   ${chalk.bold(dep.ecosystem)} ${chalk.gray(`(${dep.manifestFile})`)}`);
    console.log(`     ${dep.dependencyCount} dependencies`);
    if (dep.dependencies.length > 0) {
      const more = dep.dependencies.length > 5 ? `, +${dep.dependencies.length - 5} more` : '';
      console.log(chalk.gray(`     ${dep.dependencies.slice(0, 5).join(', ')}${more}`));
    }
  }
  console.log('');
}

function printGit(result: AnalysisResult): void {
  const git = result.gitMetrics;
  console.log(chalk.bold.blue('📊 Git Activity'));
  if (!git || !git.isGitRepo) {
    console.log(chalk.gray('   Not a git repository'));
    console.log('');
    return;
  }

  console.log(`   Commits:      ${fmt(git.commitCount)}`);
  console.log(`   Contributors: ${git.contributorCount}`);

  const days = git.daysSinceLastCommit;
  if (days !== null) {
    const label = days === 0 ? 'today' : days === 1 ? 'yesterday' : `${days} days ago`;
    const color = days < 30 ? chalk.green : days < 90 ? chalk.yellow : chalk.red;
    console.log(`   Last Commit:  ${color(label)}`);
  }
  console.log('');
}

function printHotspots(result: AnalysisResult): void {
  console.log(chalk.bold.red('🔥 Risk Hotspots'));
  if (result.hotspots.length === 0) {
    console.log(chalk.green('   No significant hotspots detected'));
    console.log('');
    return;
  }

  const table = new Table({
    head: [
      chalk.bold.gray('RANK'),
      chalk.bold.gray('FILE'),
      chalk.bold.gray('SCORE'),
      chalk.bold.gray('LOC'),
      chalk.bold.gray('REASON'),
    ],
    colWidths: [6, 46, 7, 8, 44],
    style: { head: [], border: ['gray'] },
    chars: TABLE_CHARS,
  });

  result.hotspots.forEach((h, i) => {
    table.push([
      chalk.gray(String(i + 1).padStart(3)),
      truncatePath(h.filePath, 44),
      riskChalk(h.riskScore)(h.riskScore.toFixed(0).padStart(3)),
      String(h.linesOfCode),
      h.reason,
    ]);
  });

  console.log(table.toString());
  console.log('');
}

function printScanTime(result: AnalysisResult): void {
  let line = chalk.gray(`⚡ Scan completed in ${result.scanTime.toFixed(2)}s`);
  const cache = result.cacheStats;
  if (cache?.enabled && cache.hitRate > 0) {
    line += chalk.gray(` (cache: ${cache.hitRate.toFixed(0)}% hit rate, ~${cache.timeSavedEstimate.toFixed(2)}s saved)`);
  }
  console.log(line);
  console.log('');
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function fmt(n: number): string {
  return n.toLocaleString('en-US');
}

/** One block per 5 points, padded to 20. */
function makeBar(score: number): string {
  const filled = Math.max(0, Math.min(20, Math.floor(score / 5)));
  return scoreChalk(score)('█'.repeat(filled)) + ' '.repeat(20 - filled);
}

function scoreChalk(score: number): ChalkInstance {
  if (score >= 80) return chalk.green;
  if (score >= 60) return chalk.yellow;
  if (score >= 40) return chalk.hex('#ff8800');
  return chalk.red;
}

function riskChalk(risk: number): ChalkInstance {
  if (risk > 70) return chalk.red;
  if (risk > 50) return chalk.yellow;
  return chalk.hex('#ff8800');
}

function truncatePath(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return chalk.gray('…') + str.slice(-(maxLen - 1));
}

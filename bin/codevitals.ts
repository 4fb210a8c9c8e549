#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, resolve } from 'path';

import { analyzeCodebase } from '../src/scan/analyzer.js';
import { DEFAULT_MAX_HOTSPOTS } from '../src/scoring/hotspot-detector.js';
import {
  ciExitCode,
  ciResultToJson,
  evaluateThresholds,
  EXIT_CODES,
  parseThresholds,
} from '../src/scoring/ci-thresholds.js';
import { errorDocument, reportJson, sortKeys, toJsonDocument } from '../src/reporters/json.js';
import { reportCiSummary, reportTerminal } from '../src/reporters/terminal.js';
import {
  compactSummary,
  healthBlock,
  isCiEnvironment,
  jsonSummary,
  markdownSummary,
} from '../src/reporters/markdown.js';
import { DEFAULT_MARKERS, injectHealthBlock } from '../src/reporters/readme-inject.js';
import { log } from '../src/log.js';
import { VERSION } from '../src/version.js';
import type { AnalysisResult, ScanConfig } from '../src/types.js';

interface CommonOptions {
  git: boolean;
  cache: boolean;
  clearCache?: boolean;
}

interface ScanOptions extends CommonOptions {
  basic?: boolean;
  json?: boolean;
}

interface CiOptions extends CommonOptions {
  failUnder?: string;
  maxRisk?: string;
  maxOnboarding?: string;
  json?: boolean;
}

interface SummaryOptions extends CommonOptions {
  badges?: boolean;
  compact?: boolean;
  json?: boolean;
}

interface InjectOptions {
  repo?: string;
  check?: boolean;
  startMarker: string;
  endMarker: string;
  git: boolean;
  cache: boolean;
}

const program = new Command();

program
  .name('codevitals')
  .description('Grade the health of a source tree: hotspots, tests, git activity and CI gates.')
  .version(VERSION)
  .option('--debug', 'Print debug diagnostics to stderr', false)
  .hook('preAction', () => {
    if (program.opts<{ debug: boolean }>().debug) log.setDebug(true);
  });

// ── scan ──────────────────────────────────────────────────────────────────────

program
  .command('scan')
  .description('Analyze a codebase and print the full report')
  .argument('[path]', 'Directory to analyze', '.')
  .option('--no-git', 'Skip git repository detection')
  .option('--basic', 'Counts only: skip complexity, tests, hotspots, dependencies and scoring', false)
  .option('--json', 'Output the result as a schema-versioned JSON document', false)
  .option('--no-cache', 'Do not read or write the metadata cache')
  .option('--clear-cache', 'Delete the metadata cache before scanning', false)
  .action(async (path: string, opts: ScanOptions) => {
    const json = Boolean(opts.json);
    await guarded(json, async () => {
      const config = resolveConfig(path, opts, !opts.basic);
      const result = await runAnalysis(config, json);

      if (json) {
        reportJson(toJsonDocument(result));
      } else {
        reportTerminal(result);
      }
    });
  });

// ── ci ────────────────────────────────────────────────────────────────────────

program
  .command('ci')
  .description('Analyze and fail (exit 2) when health thresholds are not met')
  .argument('[path]', 'Directory to analyze', '.')
  .option('--fail-under <grade>', 'Fail when the maintainability grade is worse than this (A–F)')
  .option('--max-risk <level>', 'Fail when the risk level is worse than this (Low, Medium, High)')
  .option('--max-onboarding <level>', 'Fail when onboarding is harder than this (Easy, Moderate, Hard)')
  .option('--json', 'Output the result and the CI verdict as JSON', false)
  .option('--no-git', 'Skip git repository detection')
  .option('--no-cache', 'Do not read or write the metadata cache')
  .option('--clear-cache', 'Delete the metadata cache before scanning', false)
  .action(async (path: string, opts: CiOptions) => {
    const json = Boolean(opts.json);
    await guarded(json, async () => {
      const thresholds = parseThresholds({
        failUnder:     opts.failUnder,
        maxRisk:       opts.maxRisk,
        maxOnboarding: opts.maxOnboarding,
      });

      const config = resolveConfig(path, opts, true);
      const result = await runAnalysis(config, json);
      const verdict = evaluateThresholds(result.healthScore, thresholds);

      if (json) {
        reportJson(sortKeys({ ...toJsonDocument(result), ci: ciResultToJson(verdict) }));
      } else {
        reportCiSummary(result, verdict);
      }

      process.exitCode = ciExitCode(verdict);
    });
  });

// ── summary ───────────────────────────────────────────────────────────────────

program
  .command('summary')
  .description('Print a markdown summary suitable for PR comments and READMEs')
  .argument('[path]', 'Directory to analyze', '.')
  .option('--badges', 'Include shields.io badges', false)
  .option('--compact', 'Single-line summary', false)
  .option('--json', 'Flat JSON summary for bots and integrations', false)
  .option('--no-git', 'Skip git repository detection')
  .option('--no-cache', 'Do not read or write the metadata cache')
  .option('--clear-cache', 'Delete the metadata cache before scanning', false)
  .action(async (path: string, opts: SummaryOptions) => {
    const json = Boolean(opts.json);
    await guarded(json, async () => {
      const config = resolveConfig(path, opts, true);
      const result = await runAnalysis(config, true);
      const isCi = isCiEnvironment();

      if (json) {
        reportJson(sortKeys(jsonSummary(result, { isCi })));
      } else if (opts.compact) {
        console.log(compactSummary(result));
      } else {
        console.log(markdownSummary(result, { includeBadges: opts.badges, isCi }));
      }
    });
  });

// ── inject ────────────────────────────────────────────────────────────────────

program
  .command('inject')
  .description('Write the health block into a README between marker comments')
  .argument('[readme]', 'README file to update', 'README.md')
  .option('--repo <path>', 'Directory to analyze (default: the README\'s directory)')
  .option('--check', 'Exit 2 when the README is out of date, without writing', false)
  .option('--start-marker <marker>', 'Start marker comment', DEFAULT_MARKERS.start)
  .option('--end-marker <marker>', 'End marker comment', DEFAULT_MARKERS.end)
  .option('--no-git', 'Skip git repository detection')
  .option('--no-cache', 'Do not read or write the metadata cache')
  .action(async (readme: string, opts: InjectOptions) => {
    await guarded(false, async () => {
      const readmePath = resolve(readme);
      if (!existsSync(readmePath)) throw new Error(`README not found: ${readmePath}`);

      const markers = { start: opts.startMarker, end: opts.endMarker };
      const original = readFileSync(readmePath, 'utf8');
      if (!original.includes(markers.start) || !original.includes(markers.end)) {
        console.error(chalk.red(`Error: Markers not found in ${basename(readmePath)}`));
        console.error('\nAdd these markers to your README:\n');
        console.error(`    ${markers.start}`);
        console.error(`    ${markers.end}\n`);
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }

      const scanRoot = opts.repo ?? dirname(readmePath);
      const config = resolveConfig(scanRoot, { ...opts, clearCache: false }, true);
      if (!opts.check) console.error(chalk.gray(`Analyzing ${basename(config.root)}...`));
      const result = await analyzeCodebase(config);

      const injected = injectHealthBlock(original, healthBlock(result), markers);
      switch (injected.status) {
        case 'missing-markers':
        case 'invalid-markers':
          throw new Error(`Invalid marker positions in ${basename(readmePath)}`);

        case 'unchanged':
          console.log(`${chalk.green('✓')} ${opts.check ? 'No changes needed' : 'Health block up to date (no changes)'}`);
          return;

        case 'updated':
          if (opts.check) {
            console.log(`${chalk.yellow('⚠')}  Health block needs update`);
            process.exitCode = EXIT_CODES.VIOLATION;
            return;
          }
          writeFileSync(readmePath, injected.content, 'utf8');
          console.log(`${chalk.green('✓')} Updated ${basename(readmePath)}`);
          console.log(chalk.gray(`  Grade: ${result.healthScore?.maintainabilityGrade ?? 'N/A'}`));
          console.log(chalk.gray(`  Scan time: ${result.scanTime.toFixed(2)}s`));
      }
    });
  });

await program.parseAsync(process.argv);

// ── Helpers ───────────────────────────────────────────────────────────────────

function resolveConfig(path: string, opts: CommonOptions, intelligence: boolean): ScanConfig {
  const root = resolve(path);
  if (!existsSync(root)) throw new Error(`Path does not exist: ${root}`);
  if (!statSync(root).isDirectory()) throw new Error(`Not a directory: ${root}`);

  return {
    root,
    detectGit:   opts.git,
    intelligence,
    useCache:    opts.cache,
    clearCache:  Boolean(opts.clearCache),
    maxHotspots: DEFAULT_MAX_HOTSPOTS,
  };
}

/** Runs the analysis behind a spinner on stderr, or silently in quiet mode. */
async function runAnalysis(config: ScanConfig, quiet: boolean): Promise<AnalysisResult> {
  if (quiet) return analyzeCodebase(config);

  const spinner: Ora = ora({ text: `Scanning ${basename(config.root)}...`, stream: process.stderr }).start();
  try {
    const result = await analyzeCodebase(config, {
      onStep: message => { spinner.text = message; },
    });
    spinner.succeed(`${result.repoName}: ${result.totalFiles} files, ${result.totalLines} lines — ⏱ ${result.scanTime.toFixed(2)}s`);
    return result;
  } catch (err) {
    spinner.fail('Scan failed');
    throw err;
  }
}

/**
 * Command boundary: any error becomes exit code 1, printed in red or, in
 * JSON mode, as an error document on stdout.
 */
async function guarded(json: boolean, body: () => Promise<void>): Promise<void> {
  if (json) log.setQuiet(true);
  try {
    await body();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (json) {
      reportJson(errorDocument(message));
    } else {
      console.error(chalk.red.bold(`\nError: ${message}`));
      if (log.isDebug() && err instanceof Error && err.stack) console.error(chalk.gray(err.stack));
    }
    process.exitCode = EXIT_CODES.ERROR;
  }
}

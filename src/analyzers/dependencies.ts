import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { log } from '../log.js';
import type { DependencyInfo } from '../types.js';

const LISTED_LIMIT = 20;

const PackageJsonSchema = z.object({
  dependencies:    z.record(z.unknown()).optional(),
  devDependencies: z.record(z.unknown()).optional(),
});

interface ManifestParser {
  file: string;
  ecosystem: string;
  parse(content: string): string[];
}

const MANIFESTS: ManifestParser[] = [
  { file: 'pyproject.toml',   ecosystem: 'Python',            parse: parsePyproject },
  { file: 'requirements.txt', ecosystem: 'Python',            parse: parseRequirements },
  { file: 'package.json',     ecosystem: 'JavaScript/Node.js', parse: parsePackageJson },
  { file: 'Cargo.toml',       ecosystem: 'Rust',              parse: parseCargoToml },
  { file: 'go.mod',           ecosystem: 'Go',                parse: parseGoMod },
  { file: 'Package.swift',    ecosystem: 'Swift',             parse: parsePackageSwift },
  { file: 'Podfile',          ecosystem: 'iOS/CocoaPods',     parse: parsePodfile },
];

/**
 * Reads the dependency manifests found at the project root. A manifest
 * that is missing, unreadable, malformed or empty contributes nothing.
 */
export function detectDependencies(root: string): DependencyInfo[] {
  const found: DependencyInfo[] = [];

  for (const manifest of MANIFESTS) {
    const path = join(root, manifest.file);
    if (!existsSync(path)) continue;

    let deps: string[];
    try {
      deps = manifest.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.debug(`Skipping ${manifest.file}: ${message}`);
      continue;
    }

    const info = toDependencyInfo(manifest, deps);
    if (info) found.push(info);
  }

  return found;
}

function toDependencyInfo(manifest: ManifestParser, deps: string[]): DependencyInfo | null {
  if (deps.length === 0) return null;
  return {
    ecosystem:       manifest.ecosystem,
    manifestFile:    manifest.file,
    dependencyCount: deps.length,
    dependencies:    deps.slice(0, LISTED_LIMIT).sort(),
  };
}

// ─── Parsers ──────────────────────────────────────────────────────────────────

export function parsePyproject(content: string): string[] {
  return sectionLines(content, ['[project.dependencies]', '[tool.poetry.dependencies]'])
    .filter(line => line.includes('=') || line.includes(':'))
    .map(line => stripQuotes((line.split('=')[0] ?? '').split(':')[0] ?? ''))
    .filter(name => name.length > 0 && !name.startsWith('#'));
}

export function parseRequirements(content: string): string[] {
  return content.split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map(line => (line.split(/[=<>!;]/)[0] ?? '').trim())
    .filter(name => name.length > 0);
}

export function parsePackageJson(content: string): string[] {
  const pkg = PackageJsonSchema.parse(JSON.parse(content));
  return [
    ...Object.keys(pkg.dependencies ?? {}),
    ...Object.keys(pkg.devDependencies ?? {}),
  ];
}

export function parseCargoToml(content: string): string[] {
  return sectionLines(content, ['[dependencies]'])
    .filter(line => line.includes('='))
    .map(line => (line.split('=')[0] ?? '').trim())
    .filter(name => name.length > 0 && !name.startsWith('#'));
}

export function parseGoMod(content: string): string[] {
  const deps: string[] = [];

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    const parts = line.split(/\s+/);
    if (line.startsWith('require ')) {
      // `require (` opens a block; its entries are handled below
      const modulePath = parts[1];
      if (modulePath && modulePath !== '(') deps.push(modulePath);
    } else if (!line.startsWith('module') && !line.startsWith('go ')) {
      const first = parts[0] ?? '';
      if (!first.startsWith('//') && first.includes('/')) deps.push(first);
    }
  }

  return deps;
}

export function parsePackageSwift(content: string): string[] {
  const deps: string[] = [];
  for (const match of content.matchAll(/\.package\([^)]*url:\s*"([^"]+)"/g)) {
    const url = match[1] ?? '';
    const name = (url.replace(/\/+$/, '').split('/').pop() ?? '').replace(/\.git/g, '');
    if (name) deps.push(name);
  }
  return deps;
}

export function parsePodfile(content: string): string[] {
  const deps: string[] = [];
  for (const raw of content.split('\n')) {
    const match = /^pod\s+['"]([^'"]+)['"]/.exec(raw.trim());
    if (match?.[1]) deps.push(match[1]);
  }
  return deps;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

// Trimmed lines after the first matching header, up to the next `[section]`.
function sectionLines(content: string, headers: string[]): string[] {
  const lines: string[] = [];
  let inSection = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!inSection) {
      inSection = headers.some(header => line.startsWith(header));
      continue;
    }
    if (line.startsWith('[')) break;
    lines.push(line);
  }

  return lines;
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');
}

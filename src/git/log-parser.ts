import { execSync } from 'child_process';
import { existsSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import type { Commit } from '../types.js';

/**
 * Runs `git log` on the current branch and parses it into commits, newest
 * first.
 *
 * Uses a "COMMIT|" prefix on the format line so commit headers are told
 * apart from anything else git prints.
 */
export function readCommitLog(cwd: string): Commit[] {
  let output: string;
  try {
    output = execSync(
      'git log --format="COMMIT|%H|%ae|%ct|%s"',
      { cwd, encoding: 'utf8', maxBuffer: 200 * 1024 * 1024, stdio: ['ignore', 'pipe', 'pipe'] }
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`git log failed: ${message}`);
  }

  return parseCommitOutput(output);
}

export function parseCommitOutput(output: string): Commit[] {
  const commits: Commit[] = [];

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('COMMIT|')) continue;

    const parts = trimmed.split('|');
    commits.push({
      hash:      parts[1] ?? '',
      author:    parts[2] ?? '',
      timestamp: parseInt(parts[3] ?? '0', 10),
      subject:   parts.slice(4).join('|'), // re-join in case subject contains '|'
    });
  }

  return commits;
}

/** Nearest directory at or above `start` that contains a `.git` entry. */
export function findGitRoot(start: string): string | null {
  let dir = resolve(start);
  while (true) {
    if (existsSync(join(dir, '.git'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function readOriginUrl(gitRoot: string): string | null {
  try {
    const url = execSync('git config --get remote.origin.url', {
      cwd: gitRoot, encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return url || null;
  } catch {
    // no origin remote configured
    return null;
  }
}

/** `git@host:org/app.git` or `https://host/org/app/` → `app`. */
export function repoNameFromRemote(url: string): string | null {
  const name = url.trim()
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split(/[/:]/)
    .pop();
  return name ? name : null;
}

export function resolveRepoName(scanRoot: string, gitRoot: string | null): string {
  if (!gitRoot) return basename(resolve(scanRoot));
  const url = readOriginUrl(gitRoot);
  return (url ? repoNameFromRemote(url) : null) ?? basename(gitRoot);
}

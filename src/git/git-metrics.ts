import dayjs from 'dayjs';
import { log } from '../log.js';
import { readCommitLog } from './log-parser.js';
import type { Commit, GitMetrics } from '../types.js';

export const NOT_A_REPOSITORY: GitMetrics = {
  commitCount:         0,
  contributorCount:    0,
  daysSinceLastCommit: null,
  isGitRepo:           false,
};

/**
 * Commit count, distinct author emails and whole days since the newest
 * commit. `commits` is newest first, as `git log` prints it.
 */
export function computeGitMetrics(commits: readonly Commit[], now: Date = new Date()): GitMetrics {
  const authors = new Set(commits.map(c => c.author).filter(author => author.length > 0));
  const newest = commits[0];

  return {
    commitCount:         commits.length,
    contributorCount:    authors.size,
    daysSinceLastCommit: newest ? dayjs(now).diff(dayjs.unix(newest.timestamp), 'day') : null,
    isGitRepo:           true,
  };
}

/**
 * Metrics for the repository containing `gitRoot`. A repository whose log
 * cannot be read (no commits yet, git missing) reports zero activity.
 */
export function collectGitMetrics(gitRoot: string | null, now: Date = new Date()): GitMetrics {
  if (!gitRoot) return NOT_A_REPOSITORY;

  try {
    return computeGitMetrics(readCommitLog(gitRoot), now);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.debug(`Git history unavailable for ${gitRoot}: ${message}`);
    return { ...NOT_A_REPOSITORY, isGitRepo: true };
  }
}

import { existsSync, readFileSync, statSync } from 'fs';
import { isAbsolute, join, relative, sep } from 'path';
import fg from 'fast-glob';
import {
  countLines,
  excludedDirGlobs,
  extensionOf,
  filterFiles,
  gitignoreToGlobs,
  isBinaryContent,
} from '../filters/file-filter.js';
import { languageBreakdown, languageFor } from '../analyzers/languages.js';
import { log } from '../log.js';
import type { MetadataCache } from './cache.js';
import type { DirectoryCount, WalkResult } from '../types.js';

export interface WalkOptions {
  cache?: MetadataCache;
  /**
   * Directory whose `.gitignore` applies, usually the repository root.
   * Its patterns are matched against paths relative to it. Defaults to
   * the scan root.
   */
  ignoreRoot?: string;
}

const ROOT_DIR_LABEL = '(root)';

/**
 * Lists every analyzable file under `root` and measures it: lines, bytes,
 * language share and per-directory file counts. The `.gitignore` at the
 * ignore root is honoured. Paths in the result are relative to `root` and
 * sorted.
 */
export async function walkCodebase(root: string, options: WalkOptions = {}): Promise<WalkResult> {
  const prefix = scanPrefix(options.ignoreRoot ?? root, root);
  const cwd = prefix === null ? root : options.ignoreRoot ?? root;

  // Globbing runs from the ignore root, restricted to the scan root's subtree.
  const base = prefix ? `${fg.escapePath(prefix)}/` : '';
  const ignore = [
    ...excludedDirGlobs().map(glob => base + glob),
    ...readGitignore(cwd),
  ];

  const entries = await fg(`${base}**/*`, {
    cwd,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore,
  });
  const strip = prefix ? prefix.length + 1 : 0;
  const files = filterFiles(entries.map(entry => entry.slice(strip))).sort();

  const lineCounts      = new Map<string, number>();
  const sizes           = new Map<string, number>();
  const binaryFiles     = new Set<string>();
  const extensionCounts = new Map<string, number>();
  const dirCounts       = new Map<string, number>();
  let totalLines = 0;

  for (const file of files) {
    const ext = extensionOf(file);
    const measured = measureFile(root, file, ext, options.cache);

    sizes.set(file, measured.size);
    if (measured.binary) binaryFiles.add(file);
    if (measured.lines > 0) lineCounts.set(file, measured.lines);
    totalLines += measured.lines;

    if (ext) extensionCounts.set(ext, (extensionCounts.get(ext) ?? 0) + 1);

    const slash = file.lastIndexOf('/');
    const dir = slash === -1 ? ROOT_DIR_LABEL : file.slice(0, slash);
    dirCounts.set(dir, (dirCounts.get(dir) ?? 0) + 1);
  }

  return {
    files,
    lineCounts,
    sizes,
    binaryFiles,
    totalFiles: files.length,
    totalLines,
    languages: languageBreakdown(extensionCounts, files.length),
    largestDirs: rankDirectories(dirCounts),
  };
}

export function rankDirectories(dirCounts: ReadonlyMap<string, number>): DirectoryCount[] {
  return [...dirCounts.entries()]
    .map(([directory, fileCount]) => ({ directory, fileCount }))
    .sort((a, b) => b.fileCount - a.fileCount || compareStrings(a.directory, b.directory));
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

interface Measurement {
  size: number;
  lines: number;
  binary: boolean;
}

function measureFile(root: string, file: string, ext: string, cache?: MetadataCache): Measurement {
  const absolute = join(root, file);

  let size: number;
  let mtimeMs: number;
  try {
    ({ size, mtimeMs } = statSync(absolute));
  } catch (err) {
    log.debug(`Cannot stat ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return { size: 0, lines: 0, binary: false };
  }

  const stamp = { size, mtimeMs };
  const cached = cache?.get(file, stamp);
  if (cached) return { size, lines: cached.lines, binary: cached.binary };

  let content: Buffer;
  try {
    content = readFileSync(absolute);
  } catch (err) {
    // Unreadable files count toward totals with no lines and are not cached.
    log.debug(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return { size, lines: 0, binary: true };
  }

  const binary = isBinaryContent(content);
  const lines = binary ? 0 : countLines(content);
  cache?.set(file, stamp, { lines, binary, language: ext ? languageFor(ext) : null });

  return { size, lines, binary };
}

/**
 * `root` relative to `ignoreRoot` with `/` separators: '' when they are the
 * same directory, null when `root` lies outside `ignoreRoot`.
 */
function scanPrefix(ignoreRoot: string, root: string): string | null {
  const rel = relative(ignoreRoot, root);
  if (rel === '') return '';
  if (isAbsolute(rel) || rel === '..' || rel.startsWith(`..${sep}`)) return null;
  return rel.split(sep).join('/');
}

function readGitignore(dir: string): string[] {
  const path = join(dir, '.gitignore');
  if (!existsSync(path)) return [];
  try {
    return gitignoreToGlobs(readFileSync(path, 'utf8'));
  } catch (err) {
    log.debug(`Ignoring unreadable .gitignore: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

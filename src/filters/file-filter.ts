import { log } from '../log.js';

const EXCLUDED_DIRS = new Set([
  '.git', '.svn', '.hg', '.bzr',
  'node_modules', 'bower_components', 'vendor',
  'venv', 'env', '.env', '.eggs', '.tox',
  'dist', 'build', 'target', 'out',
  '__pycache__', '.pytest_cache', '.mypy_cache',
  '.vscode', '.idea', '.vs',
]);

const EXCLUDED_DIR_SUFFIXES = ['.egg-info'];

const BINARY_EXTENSIONS = new Set([
  '.pyc', '.pyo', '.so', '.dll', '.dylib', '.exe', '.bin',
  // Images & fonts
  '.jpg', '.jpeg', '.png', '.gif', '.ico',
  '.woff', '.woff2', '.ttf', '.eot',
  // Archives & documents
  '.pdf', '.zip', '.tar', '.gz',
]);

const SNIFF_BYTES = 8192;
const MAX_NON_TEXT_RATIO = 0.3;

/**
 * Removes paths the scan never looks at: anything under a dependency, build
 * or tooling directory, and any hidden file or directory.
 */
export function filterFiles(files: string[]): string[] {
  return files.filter(file => {
    if (!file) return false;

    for (const seg of file.split('/')) {
      if (seg.startsWith('.')) return false;
      if (EXCLUDED_DIRS.has(seg)) return false;
      if (EXCLUDED_DIR_SUFFIXES.some(suffix => seg.endsWith(suffix))) return false;
    }

    return true;
  });
}

/** Glob ignore patterns that prune excluded directories during traversal. */
export function excludedDirGlobs(): string[] {
  return [
    ...[...EXCLUDED_DIRS].map(dir => `**/${dir}/**`),
    ...EXCLUDED_DIR_SUFFIXES.map(suffix => `**/*${suffix}/**`),
  ];
}

/**
 * Translates `.gitignore` lines into glob ignore patterns.
 *
 * A leading `/` (or any inner `/`) anchors the pattern to the root; a
 * trailing `/` restricts it to directories. Negations (`!pattern`) are not
 * supported and are skipped.
 */
export function gitignoreToGlobs(content: string): string[] {
  const globs: string[] = [];

  for (const raw of content.split(/\r?\n/)) {
    let pattern = raw.trimEnd();
    if (!pattern || pattern.startsWith('#')) continue;

    if (pattern.startsWith('!')) {
      log.debug(`gitignore negation not supported, skipping: ${pattern}`);
      continue;
    }

    const dirOnly = pattern.endsWith('/');
    if (dirOnly) pattern = pattern.replace(/\/+$/, '');

    const anchored = pattern.includes('/');
    pattern = pattern.replace(/^\/+/, '');
    if (!pattern) continue;

    const base = anchored || pattern.startsWith('**/') ? pattern : `**/${pattern}`;
    if (dirOnly) {
      globs.push(`${base}/**`);
    } else {
      globs.push(base, `${base}/**`);
    }
  }

  return globs;
}

export function hasBinaryExtension(file: string): boolean {
  return BINARY_EXTENSIONS.has(extensionOf(file));
}

/**
 * Sniffs the first 8 KiB: a NUL byte, or more than 30% bytes outside the
 * printable/whitespace range, marks the content as binary.
 */
export function isBinaryContent(content: Uint8Array): boolean {
  const chunk = content.subarray(0, SNIFF_BYTES);
  if (chunk.length === 0) return false;

  let nonText = 0;
  for (const byte of chunk) {
    if (byte === 0) return true;
    if (!isTextByte(byte)) nonText++;
  }

  return nonText / chunk.length > MAX_NON_TEXT_RATIO;
}

/** Newline-terminated lines, plus one for a trailing unterminated line. */
export function countLines(content: Uint8Array): number {
  if (content.length === 0) return 0;

  let lines = 0;
  for (const byte of content) {
    if (byte === 0x0a) lines++;
  }

  return content[content.length - 1] === 0x0a ? lines : lines + 1;
}

/** Lower-cased final extension including the dot, or '' when there is none. */
export function extensionOf(file: string): string {
  const name = file.slice(file.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot <= 0 ? '' : name.slice(dot).toLowerCase();
}

function isTextByte(byte: number): boolean {
  if (byte === 7 || byte === 8 || byte === 9 || byte === 10 || byte === 12 || byte === 13 || byte === 27) {
    return true;
  }
  return byte >= 0x20 && byte !== 0x7f;
}

const LANGUAGES: Record<string, string> = {
  '.py': 'Python',
  '.js': 'JavaScript',   '.jsx': 'JavaScript',
  '.ts': 'TypeScript',   '.tsx': 'TypeScript',
  '.java': 'Java',       '.kt': 'Kotlin',        '.scala': 'Scala',
  '.c': 'C',             '.h': 'C/C++',
  '.cpp': 'C++',         '.cc': 'C++',           '.cxx': 'C++',    '.hpp': 'C++',
  '.cs': 'C#',
  '.go': 'Go',
  '.rs': 'Rust',
  '.rb': 'Ruby',
  '.php': 'PHP',
  '.swift': 'Swift',
  '.dart': 'Dart',
  '.sh': 'Shell',        '.bash': 'Shell',       '.zsh': 'Shell',
  '.sql': 'SQL',
  '.html': 'HTML',       '.css': 'CSS',
  '.scss': 'SCSS',       '.sass': 'Sass',        '.less': 'Less',
  '.vue': 'Vue',
  '.md': 'Markdown',
  '.json': 'JSON',       '.xml': 'XML',          '.toml': 'TOML',  '.ini': 'INI',
  '.yaml': 'YAML',       '.yml': 'YAML',
  '.r': 'R',
  '.m': 'MATLAB',
  '.pl': 'Perl',
  '.lua': 'Lua',
};

/** Display name for an extension (with dot); unknown ones render as `*<ext>`. */
export function languageFor(extension: string): string {
  return LANGUAGES[extension] ?? `*${extension}`;
}

/**
 * Share of files per language, in percent. Files without an extension are
 * counted in the total but attributed to no language.
 */
export function languageBreakdown(
  extensionCounts: ReadonlyMap<string, number>,
  totalFiles: number
): Record<string, number> {
  const languages: Record<string, number> = {};
  if (totalFiles === 0) return languages;

  for (const [ext, count] of extensionCounts) {
    const lang = languageFor(ext);
    languages[lang] = (languages[lang] ?? 0) + (count / totalFiles) * 100;
  }

  return languages;
}

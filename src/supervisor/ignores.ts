/**
 * Folder Ignore Patterns
 *
 * Holds a folder's ignore patterns as written in its .stignore file together
 * with the expanded patterns the service reports, and matches relative paths
 * against them.
 * Supports simple globs: * (any chars except /), ** (any path), ? (single char)
 */

// ============================================================================
// Glob to Regex Conversion
// ============================================================================

/**
 * Escape special regex characters except glob wildcards
 */
function escapeRegexChars(str: string): string {
  return str.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Convert an expanded ignore glob to a regex anchored at the folder root.
 *
 * - `*` matches any characters except `/`
 * - `**` matches any characters including `/` (any path depth)
 * - `?` matches a single character except `/`
 * - A leading `/` anchors the pattern at the root; otherwise it may match
 *   after any `/`
 *
 * The service expands `foo` into `foo` and `foo/**`, so no implicit
 * descendant matching is added here.
 */
export function globToRegex(glob: string, caseInsensitive = false): RegExp {
  const anchored = glob.startsWith('/');
  const body = anchored ? glob.slice(1) : glob;

  const regexStr = escapeRegexChars(body)
    .replace(/\*\*/g, '{{GLOBSTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/{{GLOBSTAR}}/g, '.*');

  const prefix = anchored ? '^' : '(^|/)';
  return new RegExp(`${prefix}${regexStr}$`, caseInsensitive ? 'i' : '');
}

// ============================================================================
// Compiled Patterns
// ============================================================================

export interface IgnoreRule {
  /** The expanded pattern as reported, prefixes included */
  source: string;
  regex: RegExp;
  /** `!pattern`: a match means "do not ignore" */
  negated: boolean;
  /** `(?d)pattern`: the service may delete the file to remove a directory */
  deletable: boolean;
}

/**
 * Parse one expanded pattern, peeling off the `!`, `(?i)` and `(?d)`
 * prefixes in any order.
 */
export function compileIgnoreRule(source: string): IgnoreRule {
  let rest = source;
  let negated = false;
  let caseInsensitive = false;
  let deletable = false;

  for (;;) {
    if (rest.startsWith('!')) {
      negated = true;
      rest = rest.slice(1);
    } else if (rest.startsWith('(?i)')) {
      caseInsensitive = true;
      rest = rest.slice(4);
    } else if (rest.startsWith('(?d)')) {
      deletable = true;
      rest = rest.slice(4);
    } else {
      break;
    }
  }

  return { source, regex: globToRegex(rest, caseInsensitive), negated, deletable };
}

export class FolderIgnores {
  /** Patterns as written in .stignore */
  readonly ignorePatterns: readonly string[];
  /** Expanded patterns compiled to regexes, in evaluation order */
  readonly regexPatterns: readonly IgnoreRule[];

  constructor(ignorePatterns: readonly string[], expandedPatterns: readonly string[]) {
    this.ignorePatterns = [...ignorePatterns];
    this.regexPatterns = expandedPatterns
      .filter((pattern) => pattern.trim() !== '' && !pattern.startsWith('//'))
      .map(compileIgnoreRule);
  }

  static empty(): FolderIgnores {
    return new FolderIgnores([], []);
  }

  /**
   * Check whether a path relative to the folder root is ignored.
   * The first matching rule decides.
   */
  isIgnored(relativePath: string): boolean {
    const normalized = relativePath.replace(/\\/g, '/').replace(/^\/+/, '');
    if (!normalized) return false;

    for (const rule of this.regexPatterns) {
      if (rule.regex.test(normalized)) {
        return !rule.negated;
      }
    }
    return false;
  }
}

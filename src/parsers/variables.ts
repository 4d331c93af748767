/**
 * Code::Blocks placeholder substitution
 *
 * Placeholders may be written `$(NAME)`, `${NAME}` or `$NAME`. Names are
 * matched case-insensitively, as Code::Blocks does. Unknown names are left
 * untouched so the build tool or the shell can still expand them.
 */
import * as path from 'path';

/**
 * Placeholder names the model builder knows values for
 */
export type PlaceholderName =
  | 'PROJECT_NAME'
  | 'PROJECT_DIR'
  | 'TARGET_NAME'
  | 'TARGET_OUTPUT_DIR'
  | 'TARGET_OUTPUT_FILE'
  | 'TARGET_OUTPUT_BASENAME'
  | 'TARGET_OBJECT_DIR'
  | 'TARGET_COMPILER_DIR';

export type PlaceholderMap = Partial<Record<PlaceholderName, string>>;

const PLACEHOLDER_PATTERN = /\$\(([A-Za-z_][A-Za-z0-9_]*)\)|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Substitutes every known placeholder in a single pass
 *
 * Values are not expanded again, so a value containing `$(...)` stays literal.
 */
export function substitutePlaceholders(value: string, placeholders: PlaceholderMap): string {
  const lookup = new Map<string, string>();
  for (const [name, replacement] of Object.entries(placeholders)) {
    if (replacement !== undefined) {
      lookup.set(name.toUpperCase(), replacement);
    }
  }

  return value.replace(PLACEHOLDER_PATTERN, (match, paren?: string, brace?: string, bare?: string) => {
    const name = (paren ?? brace ?? bare ?? '').toUpperCase();
    return lookup.get(name) ?? match;
  });
}

/**
 * Joins a directory placeholder value with the rest of a path
 *
 * `$(TARGET_OUTPUT_DIR)` is usually followed by a separator; collapse the
 * resulting double separators and a leading `./`.
 */
export function cleanSubstitutedPath(value: string): string {
  let result = value.replace(/([^:])[\\/]{2,}/g, '$1/');
  while (result.startsWith('./') && result.length > 2) {
    result = result.substring(2);
  }
  return result;
}

/**
 * Builds the placeholder map for a target
 *
 * `outputDir` is derived from the target's own resolved output path, so it is
 * only available once the output itself is known.
 */
export function targetPlaceholders(values: {
  projectName: string;
  targetName: string;
  objectDir: string;
  output?: string;
  compilerDir?: string;
}): PlaceholderMap {
  const placeholders: PlaceholderMap = {
    PROJECT_NAME: values.projectName,
    PROJECT_DIR: './',
    TARGET_NAME: values.targetName,
    TARGET_OBJECT_DIR: withTrailingSlash(values.objectDir),
  };

  if (values.output) {
    const normalized = values.output.replace(/\\/g, '/');
    const dir = path.posix.dirname(normalized);
    const ext = path.posix.extname(normalized);
    placeholders.TARGET_OUTPUT_FILE = values.output;
    placeholders.TARGET_OUTPUT_DIR = dir === '.' ? './' : withTrailingSlash(dir);
    placeholders.TARGET_OUTPUT_BASENAME = path.posix.basename(normalized, ext);
  }

  if (values.compilerDir) {
    placeholders.TARGET_COMPILER_DIR = values.compilerDir;
  }

  return placeholders;
}

function withTrailingSlash(dir: string): string {
  if (dir === '' || dir.endsWith('/') || dir.endsWith('\\')) return dir;
  return `${dir}/`;
}

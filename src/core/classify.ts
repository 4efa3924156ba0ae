import path from 'path';

export function normalizePathForMatch(p: string): string {
  const normalized = p.replace(/\\/g, '/');
  if (normalized.startsWith('./')) return normalized.slice(2);
  return normalized;
}

function trimSlashes(dir: string): string {
  return normalizePathForMatch(dir).replace(/\/+$/, '');
}

/**
 * Whether a section's source path lies under the library directory.
 *
 * String comparison only; the file does not have to exist. Absolute paths are
 * taken relative to `cwd`, so a report written with full paths classifies the
 * same as one written with project-relative paths.
 */
export function isStaticPath(sourcePath: string, libraryDir: string, cwd: string): boolean {
  const lib = trimSlashes(libraryDir);
  if (!lib) return false;

  let candidate = sourcePath;
  if (path.isAbsolute(candidate)) {
    candidate = path.relative(cwd, candidate);
  }
  candidate = normalizePathForMatch(candidate);
  if (candidate === '..' || candidate.startsWith('../')) return false;

  return candidate === lib || candidate.startsWith(`${lib}/`);
}

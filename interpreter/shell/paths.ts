import * as path from 'path';

/**
 * Rewrite an absolute path whose leading directories match a stand-in
 * prefix. The longest matching prefix wins; prefixes match whole path
 * segments only.
 */
export function applyStandinDirectories(
  filePath: string,
  standins: Readonly<Record<string, string>>
): string {
  let best: string | undefined;
  for (const prefix of Object.keys(standins)) {
    const trimmed = trimTrailingSlash(prefix);
    const matches = filePath === trimmed || filePath.startsWith(trimmed + '/');
    if (matches && (best === undefined || trimmed.length > trimTrailingSlash(best).length)) {
      best = prefix;
    }
  }
  if (best === undefined) {
    return filePath;
  }
  const replacement = trimTrailingSlash(standins[best]);
  return replacement + filePath.slice(trimTrailingSlash(best).length);
}

/** Resolve a script path against the working directory, then apply stand-ins. */
export function resolveScriptPath(
  filePath: string,
  workingDirectory: string,
  standins: Readonly<Record<string, string>>
): string {
  const absolute = path.isAbsolute(filePath)
    ? path.normalize(filePath)
    : path.resolve(workingDirectory, filePath);
  return applyStandinDirectories(absolute, standins);
}

function trimTrailingSlash(value: string): string {
  return value.length > 1 && value.endsWith('/') ? value.slice(0, -1) : value;
}

import type { RedirectMode, ShellRedirect, SplitLine } from '@core/types';

// Characters that separate words outside quotes
const SEPARATORS = new Set([' ', '\t', '\r', '\n', '(', ')', ',']);

interface PendingRedirect {
  fileno: number;
  mode: RedirectMode;
}

/**
 * Split one startup-script line into words and redirects the way the
 * controller shell does.
 *
 * Whitespace, commas and parentheses separate words; single and double
 * quotes group text and are removed; a backslash escapes the next
 * character. `\$` is kept as written so macro expansion sees the escape.
 * A `#` at the start of a word ends the line.
 */
export function splitWords(line: string): SplitLine {
  const argv: string[] = [];
  const redirects: ShellRedirect[] = [];
  let current = '';
  let inWord = false;
  let quote: string | null = null;
  let pending: PendingRedirect | null = null;

  const addRedirect = (redirect: ShellRedirect): void => {
    const existing = redirects.findIndex(r => r.fileno === redirect.fileno);
    if (existing === -1) {
      redirects.push(redirect);
    } else {
      redirects[existing] = redirect;
    }
  };

  const flush = (): void => {
    if (!inWord) {
      return;
    }
    if (pending) {
      addRedirect({ ...pending, name: current });
      pending = null;
    } else {
      argv.push(current);
    }
    current = '';
    inWord = false;
  };

  for (let i = 0; i < line.length; i++) {
    const c = line[i];

    if (c === '\\' && i + 1 < line.length) {
      const next = line[i + 1];
      current += next === '$' ? '\\$' : next;
      inWord = true;
      i++;
      continue;
    }

    if (quote) {
      if (c === quote) {
        quote = null;
      } else {
        current += c;
      }
      continue;
    }

    if (c === '"' || c === "'") {
      quote = c;
      inWord = true;
      continue;
    }

    if (SEPARATORS.has(c)) {
      flush();
      continue;
    }

    if (c === '#' && !inWord) {
      break;
    }

    if (c === '<' || c === '>') {
      let fileno = c === '<' ? 0 : 1;
      if (c === '>' && inWord && !pending && /^\d+$/.test(current)) {
        fileno = Number(current);
        current = '';
        inWord = false;
      } else {
        flush();
      }
      if (pending) {
        return { argv, redirects, error: 'Illegal redirection' };
      }
      let mode: RedirectMode = c === '<' ? 'r' : 'w';
      if (c === '>' && line[i + 1] === '>') {
        mode = 'a';
        i++;
      }
      pending = { fileno, mode };
      continue;
    }

    current += c;
    inWord = true;
  }

  if (quote) {
    return { argv, redirects, error: `Unbalanced quote (${quote})` };
  }
  flush();
  if (pending) {
    return { argv, redirects, error: 'Illegal redirection' };
  }

  return { argv, redirects };
}

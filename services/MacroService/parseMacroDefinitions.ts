/**
 * Parse a macro definition string of the form `A=1,B=two, C="x,y"`.
 *
 * Quotes group text (and are removed), a backslash escapes the next
 * character, whitespace around names and unquoted values is trimmed.
 * Entries without `=` are skipped. Later definitions of a name win.
 */
export function parseMacroDefinitions(definitions: string): Record<string, string> {
  const result: Record<string, string> = {};
  if (!definitions.trim()) {
    return result;
  }

  for (const entry of splitEntries(definitions)) {
    const eq = findUnquoted(entry, '=');
    if (eq === -1) {
      continue;
    }
    const name = unquote(entry.slice(0, eq)).trim();
    if (!name) {
      continue;
    }
    result[name] = unquote(entry.slice(eq + 1).trim());
  }

  return result;
}

function splitEntries(text: string): string[] {
  const entries: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '\\' && i + 1 < text.length) {
      current += c + text[i + 1];
      i++;
      continue;
    }
    if (quote) {
      if (c === quote) {
        quote = null;
      }
      current += c;
      continue;
    }
    if (c === '"' || c === "'") {
      quote = c;
      current += c;
      continue;
    }
    if (c === ',') {
      entries.push(current);
      current = '';
      continue;
    }
    current += c;
  }
  entries.push(current);
  return entries;
}

function findUnquoted(text: string, target: string): number {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (quote) {
      if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") {
      quote = c;
      continue;
    }
    if (c === target) {
      return i;
    }
  }
  return -1;
}

// Strip quotes and escapes; quoted whitespace survives, unquoted edges do not
function unquote(text: string): string {
  let out = '';
  let quote: string | null = null;
  let pendingSpace = '';

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '\\' && i + 1 < text.length) {
      out += pendingSpace + text[i + 1];
      pendingSpace = '';
      i++;
      continue;
    }
    if (quote) {
      if (c === quote) {
        quote = null;
      } else {
        out += c;
      }
      continue;
    }
    if (c === '"' || c === "'") {
      out += pendingSpace;
      pendingSpace = '';
      quote = c;
      continue;
    }
    if (/\s/.test(c)) {
      if (out.length > 0) {
        pendingSpace += c;
      }
      continue;
    }
    out += pendingSpace + c;
    pendingSpace = '';
  }
  return out;
}

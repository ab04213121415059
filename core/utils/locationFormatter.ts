import type { LoadContext, SourceLocation } from '@core/types';

export interface FormattedLocation {
  readonly display: string;
  readonly file?: string;
  readonly line?: number;
}

export function formatLocation(location: LoadContext | undefined): FormattedLocation {
  if (!location) {
    return { display: 'unknown location' };
  }

  return {
    display: `${location.file}:${location.line}`,
    file: location.file,
    line: location.line
  };
}

export function formatLocationForError(location: LoadContext | undefined): string {
  return formatLocation(location).display;
}

/**
 * Render a load-context chain as `st.cmd:3 -> common.cmd:12`.
 */
export function formatLoadContext(context: readonly LoadContext[]): string {
  if (context.length === 0) {
    return 'unknown location';
  }
  return context.map(ctx => formatLocation(ctx).display).join(' -> ');
}

/**
 * Render "defined at file:line with macro state {A=1, B=2}".
 */
export function formatProvenance(location: SourceLocation): string {
  const macros = Object.entries(location.macros)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');
  return `${formatLocation(location).display} with macro state {${macros}}`;
}

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in source text: 1-based line and column, 0-based offset */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Render a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}

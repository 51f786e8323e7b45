// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Format a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}

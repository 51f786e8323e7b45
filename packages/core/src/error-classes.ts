/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';
import { formatLocation, type SourceLocation } from './source-location.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface PhyloErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up error definition from registry, renders message template with context,
 * and creates PhyloError with structured metadata.
 *
 * @param errorId - Error identifier (format: NWK-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @param location - Source location where error occurred (optional)
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("NWK-P004", { what: "edge length", value: "x" }, location)
 * // Creates PhyloError: "Invalid edge length: 'x' at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): PhyloError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new PhyloError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

/**
 * Render the registry message for errorId, throwing TypeError when the id is
 * unknown or belongs to another category.
 */
function messageFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all tree-reading errors.
 * Provides structured data for host applications to format as needed.
 */
export class PhyloError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: PhyloErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'PhyloError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Error kind from the registry (e.g., 'MalformedStatement') */
  get kind(): string {
    return ERROR_REGISTRY.get(this.errorId)?.kind ?? 'Unknown';
  }

  /** Get structured error data for custom formatting */
  toData(): PhyloErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: PhyloErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenizer errors */
export class LexerError extends PhyloError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super({
      errorId,
      message: messageFor(errorId, 'lexer', context),
      location,
      context,
    });
    this.name = 'LexerError';
  }
}

/** Quoted literal not closed before end of stream */
export class UnterminatedQuoteError extends LexerError {
  readonly quote: string;

  constructor(quote: string, location: SourceLocation) {
    super('NWK-L001', { quote }, location);
    this.name = 'UnterminatedQuoteError';
    this.quote = quote;
  }
}

/** A token was required but none remained */
export class UnexpectedEndOfStreamError extends LexerError {
  constructor(location: SourceLocation) {
    super('NWK-L002', {}, location);
    this.name = 'UnexpectedEndOfStreamError';
  }
}

/** Tree statement errors */
export class ParseError extends PhyloError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation | undefined
  ) {
    super({
      errorId,
      message: messageFor(errorId, 'parse', context),
      location,
      context,
    });
    this.name = 'ParseError';
  }
}

/** Same taxon resolved for more than one node of one tree */
export class DuplicateTaxonError extends ParseError {
  readonly label: string;

  constructor(label: string, location?: SourceLocation | undefined) {
    super('NWK-P005', { label }, location);
    this.name = 'DuplicateTaxonError';
    this.label = label;
  }
}

/** Taxon namespace and symbol resolution errors */
export class TaxonError extends PhyloError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation | undefined
  ) {
    super({
      errorId,
      message: messageFor(errorId, 'taxon', context),
      location,
      context,
    });
    this.name = 'TaxonError';
  }
}

/** Invalid tokenizer, resolver or reader options */
export class ConfigError extends PhyloError {
  constructor(detail: string) {
    super({
      errorId: 'NWK-C001',
      message: messageFor('NWK-C001', 'config', { detail }),
      context: { detail },
    });
    this.name = 'ConfigError';
  }
}

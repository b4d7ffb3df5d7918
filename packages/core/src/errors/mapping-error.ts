/**
 * Error types for the mapping engine and its collaborators
 */

export type MappingErrorCode =
  | 'DUPLICATE_ID'
  | 'EMPTY_GLOSSARY'
  | 'INVALID_ATTRIBUTE'
  | 'GLOSSARY_NOT_LOADED'
  | 'GLOSSARY_SOURCE_ERROR'
  | 'INVALID_CONFIG'
  | 'SINK_FAILED'
  | 'TIMEOUT'
  | 'INVALID_RULE'
  | 'UNKNOWN';

export interface MappingErrorDetails {
  /** Error code for programmatic handling */
  code: MappingErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class MappingError extends Error {
  readonly code: MappingErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MappingErrorDetails) {
    super(details.message);
    this.name = 'MappingError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Format error for operators and MCP clients
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/** Two glossary entries share an id; fatal to that reload */
export class DuplicateIdError extends MappingError {
  readonly entityId: string;

  constructor(entityId: string, context?: Record<string, unknown>) {
    super({
      code: 'DUPLICATE_ID',
      message: `Duplicate reference entity id: ${entityId}`,
      suggestion: 'Fix the glossary so every entity id is unique, then reload.',
      context: { entityId, ...context },
    });
    this.name = 'DuplicateIdError';
    this.entityId = entityId;
  }
}

/** The glossary contained no entities; fatal to that reload */
export class EmptyGlossaryError extends MappingError {
  constructor(context?: Record<string, unknown>) {
    super({
      code: 'EMPTY_GLOSSARY',
      message: 'Reference glossary is empty',
      suggestion: 'Check the glossary source; the previous snapshot stays active.',
      context,
    });
    this.name = 'EmptyGlossaryError';
  }
}

/** A record is missing a required attribute or has a value of unsupported shape */
export class InvalidAttributeError extends MappingError {
  readonly attribute: string;

  constructor(attribute: string, reason: string, context?: Record<string, unknown>) {
    super({
      code: 'INVALID_ATTRIBUTE',
      message: `Invalid attribute '${attribute}': ${reason}`,
      context: { attribute, reason, ...context },
    });
    this.name = 'InvalidAttributeError';
    this.attribute = attribute;
  }
}

/** No glossary generation has been loaded yet */
export class GlossaryNotLoadedError extends MappingError {
  constructor() {
    super({
      code: 'GLOSSARY_NOT_LOADED',
      message: 'No reference glossary has been loaded',
      suggestion: 'Call reload() and wait for it to succeed before mapping records.',
    });
    this.name = 'GlossaryNotLoadedError';
  }
}

/** A glossary source could not produce a complete glossary */
export class GlossarySourceError extends MappingError {
  constructor(message: string, options?: { suggestion?: string; cause?: Error; context?: Record<string, unknown> }) {
    super({ code: 'GLOSSARY_SOURCE_ERROR', message, ...options });
    this.name = 'GlossarySourceError';
  }
}

/** Invalid engine or application configuration */
export class ConfigError extends MappingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'INVALID_CONFIG', message, context });
    this.name = 'ConfigError';
  }
}

/**
 * Helper to wrap unknown errors as MappingError
 */
export function wrapError(error: unknown, defaultCode: MappingErrorCode = 'UNKNOWN'): MappingError {
  if (error instanceof MappingError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new MappingError({ code: defaultCode, message, cause });
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

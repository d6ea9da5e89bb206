/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Source data errors (files that cannot be found, read, parsed or validated)
 */
export type SourceError =
  | (AppError & { readonly type: 'NotFound'; readonly path: string })
  | (AppError & { readonly type: 'ReadError'; readonly path: string })
  | (AppError & { readonly type: 'ParseError'; readonly path: string })
  | (AppError & {
      readonly type: 'SchemaValidationError';
      readonly path: string;
      readonly details: string[];
    });

export const createNotFoundError = (path: string): SourceError => ({
  type: 'NotFound',
  message: `Source file not found at ${path}`,
  path,
});

export const createReadError = (path: string, cause: unknown): SourceError => ({
  type: 'ReadError',
  message: `Failed to read source file at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
  path,
  cause,
});

export const createParseError = (path: string, cause: unknown): SourceError => ({
  type: 'ParseError',
  message: `Failed to parse source file at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
  path,
  cause,
});

export const createSchemaValidationError = (path: string, details: string[]): SourceError => ({
  type: 'SchemaValidationError',
  message: `Schema validation failed for ${path}`,
  path,
  details,
});

export class InvalidSchemaError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid schema: ${issues.join('; ')}`);
    this.name = 'InvalidSchemaError';
    this.issues = issues;
  }
}

export class DdlParseError extends Error {
  constructor(message: string) {
    super(`DDL parse failed: ${message}`);
    this.name = 'DdlParseError';
  }
}

export class UnsupportedDialectError extends Error {
  readonly dialect: string;

  constructor(dialect: string, supported: string[]) {
    super(`Unsupported dbType "${dialect}". Supported: ${supported.join(', ')}`);
    this.name = 'UnsupportedDialectError';
    this.dialect = dialect;
  }
}

/** Thrown by SchemaAnalyzer when a chained call has nothing to chain from. */
export class MissingAnalysisStateError extends Error {
  constructor(what: 'schema' | 'relationships') {
    super(`No ${what} provided and no previous analysis available`);
    this.name = 'MissingAnalysisStateError';
  }
}

/** 4xx-class errors: the request was wrong, not the server. */
export const isClientError = (err: unknown) =>
  err instanceof InvalidSchemaError || err instanceof DdlParseError || err instanceof UnsupportedDialectError;

export const errorMessage = (err: unknown, fallback: string) =>
  err instanceof Error && err.message ? err.message : fallback;

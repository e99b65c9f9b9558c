export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class SqlBindError extends DatabaseError {
  constructor(message: string, public override code?: string, public override cause?: Error) {
    super(message, code, cause);
    this.name = 'SqlBindError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============ Statement construction and compilation ============

/**
 * Invalid builder call, detected at the call site
 */
export class ConstructionError extends SqlBindError {
  constructor(message: string, code = 'CONSTRUCTION_ERROR') {
    super(message, code);
    this.name = 'ConstructionError';
  }
}

export class InvalidColumnError extends ConstructionError {
  constructor(
    message: string,
    public column: string,
    public table?: string,
    public rowIndex?: number,
  ) {
    super(message, 'INVALID_COLUMN');
    this.name = 'InvalidColumnError';
  }
}

export class InconsistentColumnsError extends SqlBindError {
  constructor(
    public rowIndex: number,
    public expected: string[],
    public actual: string[],
  ) {
    super(
      `Row ${rowIndex} has columns [${actual.join(', ')}] but row 0 has [${expected.join(', ')}]`,
      'INCONSISTENT_COLUMNS',
    );
    this.name = 'InconsistentColumnsError';
  }
}

export class TypeMismatchError extends SqlBindError {
  constructor(
    public column: string,
    public expected: string[],
    public actual: string,
    public rowIndex?: number,
  ) {
    const where = rowIndex === undefined ? '' : ` (row ${rowIndex})`;
    super(
      `Column "${column}"${where} expects ${expected.join(' | ')} but got ${actual}`,
      'TYPE_MISMATCH',
    );
    this.name = 'TypeMismatchError';
  }
}

export class UnsupportedFeatureError extends SqlBindError {
  constructor(public feature: string, public dialect: string) {
    super(`${feature} is not supported by the ${dialect} dialect`, 'UNSUPPORTED_FEATURE');
    this.name = 'UnsupportedFeatureError';
  }
}

export class CallingConventionMismatchError extends SqlBindError {
  constructor(public requested: string, public executor: string) {
    super(
      `Cannot use the ${requested} calling convention with a ${executor} executor`,
      'CALLING_CONVENTION_MISMATCH',
    );
    this.name = 'CallingConventionMismatchError';
  }
}

export class AmbiguousColumnError extends SqlBindError {
  constructor(public columns: string[]) {
    super(
      `Result columns collide: ${columns.join(', ')}. Project them with qualified names or aliases`,
      'AMBIGUOUS_COLUMN',
    );
    this.name = 'AmbiguousColumnError';
  }
}

// ============ Execution collaborators ============

export class ConnectionError extends SqlBindError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends SqlBindError {
  constructor(
    message: string,
    public sql?: string,
    public params?: unknown[],
    cause?: Error,
  ) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

export class ValidationError extends SqlBindError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Normalize a thrown value so it can be attached as a cause
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

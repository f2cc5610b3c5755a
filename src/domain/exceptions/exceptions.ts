/**
 * graphwire - Graph Exceptions
 *
 * Every rule the graph enforces at provide or populate time has its own
 * error class. All of them extend {@link GraphError}, so callers can catch
 * the whole family or a single rule.
 */

/**
 * Error codes, one per rule
 */
export type GraphErrorCode =
  | 'MALFORMED_DIRECTIVE'
  | 'DUPLICATE_TYPE'
  | 'DUPLICATE_NAME'
  | 'PRE_WIRED_OBJECT'
  | 'SHAPE_VIOLATION'
  | 'MISSING_NAMED'
  | 'TYPE_MISMATCH'
  | 'INLINE_MISUSE'
  | 'INACCESSIBLE_FIELD'
  | 'UNSUPPORTED_FIELD'
  | 'MAP_MISUSE'
  | 'NO_IMPLEMENTATION'
  | 'AMBIGUOUS_IMPLEMENTATION'
  | 'SYNTHESIS_FAILED'
  | 'GRAPH_INVARIANT';

/**
 * Diagnostic context attached to a graph error
 */
export interface GraphErrorContext {
  /** Field being resolved */
  field?: string;

  /** Type declaring the field, or the type of the offending object */
  declaringType?: string;

  /** Offending value (annotation, object value, name) */
  value?: unknown;

  /** Conflicting candidates for ambiguous interface fields */
  candidates?: string[];
}

/**
 * Base class for every graph rule violation
 */
export class GraphError extends Error {
  constructor(
    public readonly code: GraphErrorCode,
    message: string,
    public readonly context: GraphErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GraphError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ==================== Provide-time errors ====================

/**
 * Annotation that names the injection marker but has no usable value
 */
export class MalformedDirectiveError extends GraphError {
  constructor(
    public readonly annotation: string,
    public readonly reason: string,
    context: GraphErrorContext = {},
  ) {
    const where =
      context.field !== undefined
        ? ` for field ${context.field} in type ${context.declaringType ?? 'unknown'}`
        : '';
    super(
      'MALFORMED_DIRECTIVE',
      `unexpected directive format \`${annotation}\`${where}: ${reason}`,
      { ...context, value: annotation },
    );
    this.name = 'MalformedDirectiveError';
  }
}

/**
 * Second non-private unnamed object of a type already in the graph
 */
export class DuplicateTypeError extends GraphError {
  constructor(typeName: string) {
    super('DUPLICATE_TYPE', `provided two unnamed instances of type ${typeName}`, {
      declaringType: typeName,
    });
    this.name = 'DuplicateTypeError';
  }
}

/**
 * Second named object under a name already taken
 */
export class DuplicateNameError extends GraphError {
  constructor(name: string) {
    super('DUPLICATE_NAME', `provided two instances named ${name}`, { value: name });
    this.name = 'DuplicateNameError';
  }
}

/**
 * Object provided with a non-empty dependency audit trail
 */
export class PreWiredObjectError extends GraphError {
  constructor(object: string) {
    super(
      'PRE_WIRED_OBJECT',
      `fields were specified on object ${object} when it was provided`,
      { declaringType: object },
    );
    this.name = 'PreWiredObjectError';
  }
}

/**
 * Unnamed object whose value is not a class instance
 */
export class ShapeViolationError extends GraphError {
  constructor(typeName: string, value: unknown) {
    super(
      'SHAPE_VIOLATION',
      `expected unnamed object value to be a class instance but got type ${typeName} with value ${String(value)}`,
      { declaringType: typeName, value },
    );
    this.name = 'ShapeViolationError';
  }
}

// ==================== Populate-time errors ====================

export class MissingNamedError extends GraphError {
  constructor(name: string, field: string, declaringType: string) {
    super(
      'MISSING_NAMED',
      `did not find object named ${name} required by field ${field} in type ${declaringType}`,
      { field, declaringType, value: name },
    );
    this.name = 'MissingNamedError';
  }
}

export class TypeMismatchError extends GraphError {
  constructor(
    name: string,
    objectType: string,
    field: string,
    fieldType: string,
    declaringType: string,
  ) {
    super(
      'TYPE_MISMATCH',
      `object named ${name} of type ${objectType} is not assignable to field ${field} (${fieldType}) in type ${declaringType}`,
      { field, declaringType, value: name },
    );
    this.name = 'TypeMismatchError';
  }
}

export class InlineMisuseError extends GraphError {
  constructor(reason: string, field: string, declaringType: string) {
    super('INLINE_MISUSE', `${reason}: field ${field} in type ${declaringType}`, {
      field,
      declaringType,
    });
    this.name = 'InlineMisuseError';
  }
}

export class InaccessibleFieldError extends GraphError {
  constructor(field: string, declaringType: string) {
    super(
      'INACCESSIBLE_FIELD',
      `inject requested on read-only field ${field} in type ${declaringType}`,
      { field, declaringType },
    );
    this.name = 'InaccessibleFieldError';
  }
}

export class UnsupportedFieldError extends GraphError {
  constructor(reason: string, field: string, declaringType: string) {
    super('UNSUPPORTED_FIELD', `${reason} ${field} in type ${declaringType}`, {
      field,
      declaringType,
    });
    this.name = 'UnsupportedFieldError';
  }
}

export class MapMisuseError extends GraphError {
  constructor(field: string, declaringType: string) {
    super(
      'MAP_MISUSE',
      `inject on map field ${field} in type ${declaringType} must be named or private`,
      { field, declaringType },
    );
    this.name = 'MapMisuseError';
  }
}

export class NoImplementationError extends GraphError {
  constructor(field: string, declaringType: string) {
    super(
      'NO_IMPLEMENTATION',
      `found no assignable value for field ${field} in type ${declaringType}`,
      { field, declaringType },
    );
    this.name = 'NoImplementationError';
  }
}

export class AmbiguousImplementationError extends GraphError {
  constructor(field: string, declaringType: string, candidates: string[]) {
    super(
      'AMBIGUOUS_IMPLEMENTATION',
      `found ${candidates.length} assignable values for field ${field} in type ${declaringType}: ${candidates.join(', ')}`,
      { field, declaringType, candidates },
    );
    this.name = 'AmbiguousImplementationError';
  }
}

/**
 * Constructor of a value the resolver had to create threw
 */
export class SynthesisError extends GraphError {
  constructor(typeName: string, field: string, declaringType: string, cause: unknown) {
    super(
      'SYNTHESIS_FAILED',
      `failed to create ${typeName} for field ${field} in type ${declaringType}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { field, declaringType, value: typeName },
      { cause },
    );
    this.name = 'SynthesisError';
  }
}

/**
 * Internal invariant broken; indicates a bug in the resolver, not bad input
 */
export class GraphInvariantError extends GraphError {
  constructor(message: string, context: GraphErrorContext = {}) {
    super('GRAPH_INVARIANT', message, context);
    this.name = 'GraphInvariantError';
  }
}

/**
 * Check whether an unknown thrown value is a graph error
 */
export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}

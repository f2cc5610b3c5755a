/**
 * graphwire - Exception Module
 *
 * Error taxonomy for provide and populate failures
 */

export {
  GraphError,
  MalformedDirectiveError,
  DuplicateTypeError,
  DuplicateNameError,
  PreWiredObjectError,
  ShapeViolationError,
  MissingNamedError,
  TypeMismatchError,
  InlineMisuseError,
  InaccessibleFieldError,
  UnsupportedFieldError,
  MapMisuseError,
  NoImplementationError,
  AmbiguousImplementationError,
  SynthesisError,
  GraphInvariantError,
  isGraphError,
} from './exceptions';

export type { GraphErrorCode, GraphErrorContext } from './exceptions';

/**
 * graphwire - Type Descriptor Module
 */

export {
  builtin,
  recordOf,
  structOf,
  defineInterface,
  identityOf,
  isRecordReference,
  isAssignable,
  hasMethod,
  implementsInterface,
  isIntrinsic,
  fieldTypeOf,
} from './TypeDescriptor';

export type {
  Constructor,
  BuiltinKind,
  BuiltinType,
  RecordType,
  StructType,
  InterfaceType,
  ObjectShapeType,
  TypeDescriptor,
  DeclaredType,
} from './TypeDescriptor';

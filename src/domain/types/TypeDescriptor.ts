/**
 * graphwire - Type Descriptors
 *
 * Runtime identity of the values the graph holds and of the fields it fills.
 * TypeScript erases types at compile time, so every type the resolver needs
 * to compare is modelled here explicitly:
 *
 * - classes become {@link RecordType} (a reference to an instance) or
 *   {@link StructType} (an instance owned by value, traversed with `inline`)
 * - interfaces become {@link InterfaceType} tokens listing their methods
 * - everything else maps onto a built-in kind
 *
 * @example
 * ```typescript
 * interface Clock { now(): number }
 * const ClockType = defineInterface<Clock>('Clock', ['now']);
 *
 * class SystemClock { now() { return Date.now(); } }
 *
 * isAssignable(recordOf(SystemClock), ClockType); // true
 * ```
 */

/**
 * Any class, with or without constructor parameters
 */
export type Constructor<T = object> = abstract new (...args: never[]) => T;

export type BuiltinKind =
  | 'map'
  | 'sequence'
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'symbol'
  | 'function'
  | 'unknown';

/**
 * Reference to a class instance; the unit the graph shares and synthesises
 */
export interface RecordType {
  readonly kind: 'record';
  readonly name: string;
  readonly ctor: Function;
}

/**
 * Class instance held by value inside its owner
 */
export interface StructType {
  readonly kind: 'struct';
  readonly name: string;
  readonly ctor: Function;
}

/**
 * Interface token, satisfied structurally by method names
 *
 * @template T - Interface the token stands for
 */
export interface InterfaceType<T = unknown> {
  readonly kind: 'interface';
  readonly name: string;
  readonly methods: readonly string[];
  /** Phantom marker tying the token to `T`; never set at runtime */
  readonly __type?: T;
}

/**
 * Plain object literal, described by its function-valued keys
 */
export interface ObjectShapeType {
  readonly kind: 'object';
  readonly name: string;
  readonly methods: ReadonlySet<string>;
}

export interface BuiltinType {
  readonly kind: BuiltinKind;
  readonly name: string;
}

export type TypeDescriptor =
  | RecordType
  | StructType
  | InterfaceType
  | ObjectShapeType
  | BuiltinType;

// ==================== Descriptor construction ====================

const builtins = new Map<BuiltinKind, BuiltinType>();

/**
 * Shared descriptor for a built-in kind
 */
export function builtin(kind: BuiltinKind): BuiltinType {
  let type = builtins.get(kind);
  if (!type) {
    type = Object.freeze({ kind, name: kind });
    builtins.set(kind, type);
  }
  return type;
}

const records = new WeakMap<Function, RecordType>();
const structs = new WeakMap<Function, StructType>();

/**
 * Record descriptor for a class. One descriptor per class, so the result can
 * be compared with `===` and used as a map key.
 */
export function recordOf(ctor: Function): RecordType {
  let type = records.get(ctor);
  if (!type) {
    type = Object.freeze({ kind: 'record', name: ctor.name || 'anonymous', ctor });
    records.set(ctor, type);
  }
  return type;
}

/**
 * By-value descriptor for a class
 */
export function structOf(ctor: Function): StructType {
  let type = structs.get(ctor);
  if (!type) {
    type = Object.freeze({ kind: 'struct', name: ctor.name || 'anonymous', ctor });
    structs.set(ctor, type);
  }
  return type;
}

/**
 * Define an interface token
 *
 * @param name - Name used in diagnostics
 * @param methods - Methods an implementation must expose
 */
export function defineInterface<T>(
  name: string,
  methods: readonly (keyof T & string)[],
): InterfaceType<T> {
  return Object.freeze({ kind: 'interface', name, methods: Object.freeze([...methods]) });
}

// ==================== Identity ====================

/**
 * Runtime identity of a value
 */
export function identityOf(value: unknown): TypeDescriptor {
  if (typeof value !== 'object' || value === null) return primitiveOf(value);
  if (Array.isArray(value)) return builtin('sequence');
  if (value instanceof Map) return builtin('map');

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) {
    return shapeOf(value);
  }

  const ctor = constructorOf(proto);
  return ctor ? recordOf(ctor) : shapeOf(value);
}

function primitiveOf(value: unknown): BuiltinType {
  switch (typeof value) {
    case 'string':
      return builtin('string');
    case 'number':
      return builtin('number');
    case 'boolean':
      return builtin('boolean');
    case 'bigint':
      return builtin('bigint');
    case 'symbol':
      return builtin('symbol');
    case 'function':
      return builtin('function');
    default:
      return builtin('unknown');
  }
}

function constructorOf(proto: unknown): Function | undefined {
  if (typeof proto !== 'object' || proto === null) return undefined;
  const descriptor = Object.getOwnPropertyDescriptor(proto, 'constructor');
  if (descriptor && typeof descriptor.value === 'function') return descriptor.value;
  return undefined;
}

function shapeOf(value: object): ObjectShapeType {
  const methods = new Set<string>();
  for (const [key, member] of Object.entries(value)) {
    if (typeof member === 'function') methods.add(key);
  }
  return { kind: 'object', name: 'object', methods };
}

/**
 * Only references to class instances can be shared, indexed and synthesised
 */
export function isRecordReference(type: TypeDescriptor): type is RecordType {
  return type.kind === 'record';
}

// ==================== Assignability ====================

/**
 * Whether a value of type `source` can fill a field declared as `target`
 */
export function isAssignable(source: TypeDescriptor, target: TypeDescriptor): boolean {
  if (source === target) return true;

  switch (target.kind) {
    case 'unknown':
      return true;
    case 'record':
      return source.kind === 'record' && extendsClass(source.ctor, target.ctor);
    case 'struct':
      return false;
    case 'interface':
      return satisfies(source, target);
    case 'object':
      return false;
    default:
      return source.kind === target.kind;
  }
}

function extendsClass(ctor: Function, base: Function): boolean {
  return ctor === base || ctor.prototype instanceof base;
}

function satisfies(source: TypeDescriptor, target: InterfaceType): boolean {
  switch (source.kind) {
    case 'record':
      return target.methods.every((method) => hasMethod(source.ctor.prototype, method));
    case 'object':
      return target.methods.every((method) => source.methods.has(method));
    case 'interface':
      return target.methods.every((method) => source.methods.includes(method));
    default:
      return false;
  }
}

/**
 * Whether a value implements an interface. Methods may live on the value
 * itself (arrow-function properties) or anywhere on its prototype chain.
 */
export function implementsInterface(value: unknown, target: InterfaceType): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return target.methods.every((method) => hasMethod(value, method));
}

/**
 * Walk the prototype chain without invoking getters
 */
export function hasMethod(proto: unknown, method: string): boolean {
  let current: unknown = proto;
  while (typeof current === 'object' && current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, method);
    if (descriptor) return typeof descriptor.value === 'function';
    current = Object.getPrototypeOf(current);
  }
  return false;
}

// ==================== Field types ====================

/**
 * What a field was declared with: a descriptor, a class, or the
 * `design:type` the compiler emitted
 */
export type DeclaredType = TypeDescriptor | Function | undefined;

const wellKnown = new Map<Function, BuiltinKind>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
  [BigInt, 'bigint'],
  [Symbol, 'symbol'],
  [Array, 'sequence'],
  [Map, 'map'],
  [Function, 'function'],
  [Object, 'unknown'],
]);

const intrinsics = new Set<Function>([
  Promise,
  Date,
  RegExp,
  Error,
  Set,
  WeakMap,
  WeakSet,
  WeakRef,
  ArrayBuffer,
  DataView,
]);

/**
 * Built-in classes the graph never creates or shares
 */
export function isIntrinsic(ctor: Function): boolean {
  return intrinsics.has(ctor);
}

/**
 * Descriptor for a declared field type
 *
 * @param declared - Declared type of the field
 * @param inline - Whether the field carries the `inline` directive; a class
 *   reached through `inline` is held by value
 */
export function fieldTypeOf(declared: DeclaredType, inline: boolean): TypeDescriptor {
  if (declared === undefined) return builtin('unknown');
  if (typeof declared !== 'function') return declared;

  const kind = wellKnown.get(declared);
  if (kind) return builtin(kind);

  return inline ? structOf(declared) : recordOf(declared);
}

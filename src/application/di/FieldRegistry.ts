/**
 * graphwire - Field Registry
 *
 * Injection directives are declared per class, ahead of time, either with the
 * {@link Inject} property decorator or with {@link defineFields} for classes
 * that cannot carry decorators. The resolver never enumerates an object's
 * properties; it only visits the fields registered here.
 *
 * Registrations are stored with `reflect-metadata` on each class prototype.
 * A subclass sees its base class fields first, then its own.
 *
 * @example
 * ```typescript
 * class UserService {
 *   @Inject() repository!: UserRepository;
 *   @Inject('private') cache!: QueryCache;
 *   @Inject('', { type: LoggerType }) logger!: Logger;
 *   @Inject('primary') connection!: Connection;
 * }
 * ```
 */

import 'reflect-metadata';
import { Constructor, DeclaredType, TypeDescriptor } from '../../domain/types';

const FIELDS_KEY = Symbol.for('graphwire:fields');

/**
 * Options accepted by {@link Inject}
 */
export interface FieldOptions {
  /**
   * Declared type of the field. Required for interface-typed fields, whose
   * emitted `design:type` is only `Object`.
   */
  type?: TypeDescriptor | Constructor;

  /**
   * The inline field composes its record into the owner the way a base
   * class would; the provided object is flagged as embedded.
   */
  embedded?: boolean;
}

/**
 * A registered field
 */
export interface FieldDefinition {
  readonly name: string;

  /** Raw directive annotation, parsed lazily by the graph */
  readonly annotation: string;

  readonly declared: DeclaredType;
  readonly embedded: boolean;
}

/**
 * Entry of a {@link defineFields} table
 */
export interface FieldSpec extends FieldOptions {
  /** Directive annotation, plain when omitted */
  directive?: string;
}

function ownFields(proto: object): Map<string, FieldDefinition> | undefined {
  const fields: unknown = Reflect.getOwnMetadata(FIELDS_KEY, proto);
  return fields instanceof Map ? fields : undefined;
}

/**
 * Register one field on a class prototype
 */
export function registerField(
  proto: object,
  name: string,
  annotation: string,
  declared: DeclaredType,
  embedded = false,
): void {
  let fields = ownFields(proto);
  if (!fields) {
    fields = new Map();
    Reflect.defineMetadata(FIELDS_KEY, fields, proto);
  }
  fields.set(name, { name, annotation, declared, embedded });
}

/**
 * Mark a property for injection
 *
 * @param annotation - Directive annotation: `''` (plain), `'inline'`,
 *   `'private'` or an object name
 * @param options - Explicit type and composition flags
 */
export function Inject(annotation = '', options: FieldOptions = {}): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    if (typeof propertyKey === 'symbol') {
      throw new TypeError(`@Inject cannot decorate symbol property ${propertyKey.toString()}`);
    }

    const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
    const declared = options.type ?? (typeof designType === 'function' ? designType : undefined);

    registerField(target, propertyKey, annotation, declared, options.embedded);
  };
}

/**
 * Register fields without decorators
 *
 * @example
 * ```typescript
 * defineFields(ReportJob, {
 *   mailer: { type: Mailer },
 *   scratch: { directive: 'private', type: Map },
 * });
 * ```
 */
export function defineFields(ctor: Constructor, table: Record<string, FieldSpec>): void {
  for (const [name, spec] of Object.entries(table)) {
    registerField(ctor.prototype, name, spec.directive ?? '', spec.type, spec.embedded);
  }
}

/**
 * Fields registered for a value's class and its base classes
 */
export function fieldsOf(value: object): FieldDefinition[] {
  const chain: Map<string, FieldDefinition>[] = [];

  let proto: unknown = Object.getPrototypeOf(value);
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    const fields = ownFields(proto);
    if (fields) chain.unshift(fields);
    proto = Object.getPrototypeOf(proto);
  }

  const merged = new Map<string, FieldDefinition>();
  for (const fields of chain) {
    for (const [name, field] of fields) {
      merged.set(name, field);
    }
  }
  return [...merged.values()];
}

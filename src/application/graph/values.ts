/**
 * graphwire - Field value checks
 */

import { builtin, fieldTypeOf, TypeDescriptor } from '../../domain/types';
import { fieldsOf } from '../di/FieldRegistry';

/**
 * Whether a field still holds its zero value and may be filled
 *
 * `undefined` and `null` are zero for every kind. Primitives are zero at
 * `''`, `0`, `0n` and `false`. A by-value record is zero when every one of
 * its own fields is; nested inline fields are checked the same way.
 * Every other object counts as set.
 */
export function isZero(value: unknown, type: TypeDescriptor): boolean {
  if (value === undefined || value === null) return true;

  switch (typeof value) {
    case 'string':
      return value === '';
    case 'number':
      return value === 0;
    case 'bigint':
      return value === BigInt(0);
    case 'boolean':
      return value === false;
    case 'object':
      return type.kind === 'struct' && isZeroStruct(value);
    default:
      return false;
  }
}

function isZeroStruct(value: object): boolean {
  const inline = new Map(
    fieldsOf(value)
      .filter((field) => field.annotation === 'inline')
      .map((field): [string, TypeDescriptor] => [field.name, fieldTypeOf(field.declared, true)]),
  );

  return Object.entries(value).every(([key, member]) =>
    isZero(member, inline.get(key) ?? builtin('unknown')),
  );
}

/**
 * Whether assigning `target[key]` would take effect
 *
 * Fails for non-writable data properties, accessors without a setter and
 * missing properties on non-extensible objects.
 */
export function isWritable(target: object, key: string): boolean {
  let current: unknown = target;

  while (typeof current === 'object' && current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      if (descriptor.get || descriptor.set) return descriptor.set !== undefined;
      if (descriptor.writable !== true) return false;
      return current === target || Object.isExtensible(target);
    }
    current = Object.getPrototypeOf(current);
  }

  return Object.isExtensible(target);
}

/**
 * graphwire - Graph Object
 *
 * A node of the object graph: one wrapped value plus the bookkeeping the
 * resolver needs. The caller keeps ownership of `value`; the resolver only
 * assigns its fields.
 */

import { identityOf, TypeDescriptor } from '../types';

/**
 * Options for an object supplied by the caller
 */
export interface ObjectOptions {
  /** The instance to wire */
  value: unknown;

  /** Unique name; omit for an object identified by its class */
  name?: string;

  /** Leave the object untouched during population */
  complete?: boolean;
}

/**
 * Flags the resolver sets on the objects it provides itself
 *
 * @internal
 */
export interface ObjectFlags {
  isPrivate?: boolean;
  created?: boolean;
  embedded?: boolean;
}

export class GraphObject {
  readonly value: unknown;
  readonly name: string;
  readonly complete: boolean;

  /** Field name → object that satisfied it, filled in during population */
  readonly fields = new Map<string, GraphObject>();

  /** Excluded from reuse by other objects */
  readonly isPrivate: boolean;

  /** Synthesised by the resolver */
  readonly created: boolean;

  /** Provided while traversing an inline field */
  readonly embedded: boolean;

  private descriptor?: TypeDescriptor;

  constructor(options: ObjectOptions, flags: ObjectFlags = {}) {
    this.value = options.value;
    this.name = options.name ?? '';
    this.complete = options.complete ?? false;
    this.isPrivate = flags.isPrivate ?? false;
    this.created = flags.created ?? false;
    this.embedded = flags.embedded ?? false;
  }

  /**
   * Runtime type of the wrapped value, derived on first use
   */
  get type(): TypeDescriptor {
    if (!this.descriptor) {
      this.descriptor = identityOf(this.value);
    }
    return this.descriptor;
  }

  get isNamed(): boolean {
    return this.name !== '';
  }

  /**
   * Record which object satisfied a field
   */
  addDependency(field: string, dependency: GraphObject): void {
    this.fields.set(field, dependency);
  }

  toString(): string {
    return this.isNamed ? `${this.type.name} named ${this.name}` : this.type.name;
  }
}

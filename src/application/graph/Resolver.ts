/**
 * graphwire - Resolver
 *
 * Two-phase population of an object graph.
 *
 * **Phase 1** resolves named, inline, map and class-typed fields. It visits
 * the named objects, then works through a queue of unnamed objects. Every
 * object the resolver provides along the way (a synthesised dependency, the
 * record of an inline field) is pushed onto the queue and visited in the
 * same pass.
 *
 * **Phase 2** resolves interface-typed fields against the object set phase 1
 * left behind, visiting unnamed objects first, then named ones. An interface
 * field binds only when exactly one shared object implements it.
 *
 * Each field is handled once per phase. A field that already holds a value
 * is left alone, and objects marked `complete` are never touched.
 */

import type { Directive } from '../../domain/directive';
import {
  AmbiguousImplementationError,
  GraphInvariantError,
  InaccessibleFieldError,
  InlineMisuseError,
  MalformedDirectiveError,
  MapMisuseError,
  MissingNamedError,
  NoImplementationError,
  SynthesisError,
  TypeMismatchError,
  UnsupportedFieldError,
} from '../../domain/exceptions';
import { GraphObject } from '../../domain/graph';
import {
  fieldTypeOf,
  implementsInterface,
  InterfaceType,
  isAssignable,
  isIntrinsic,
  isRecordReference,
  RecordType,
  StructType,
  TypeDescriptor,
} from '../../domain/types';
import { FieldDefinition, fieldsOf } from '../di/FieldRegistry';
import type { Graph } from './Graph';
import { isWritable, isZero } from './values';

/**
 * A field of an object under resolution
 */
interface FieldSite {
  readonly owner: GraphObject;
  readonly target: object;
  readonly field: FieldDefinition;
  readonly directive: Directive;
  readonly type: TypeDescriptor;
}

export class Resolver {
  private readonly queue: GraphObject[] = [];

  constructor(private readonly graph: Graph) {}

  run(): void {
    this.queue.push(...this.graph.unnamed);

    for (const object of this.graph.named.values()) {
      if (!object.complete) this.populateExplicit(object);
    }

    for (let cursor = 0; cursor < this.queue.length; cursor++) {
      const object = this.queue[cursor];
      if (!object.complete) this.populateExplicit(object);
    }

    for (const object of [...this.graph.unnamed, ...this.graph.named.values()]) {
      if (!object.complete) this.populateInterfaces(object);
    }
  }

  // ==================== Phase 1 ====================

  private populateExplicit(owner: GraphObject): void {
    for (const site of this.sitesOf(owner)) {
      const { field, directive, type } = site;

      if (!isWritable(site.target, field.name)) {
        throw new InaccessibleFieldError(field.name, owner.type.name);
      }

      if (directive.kind === 'inline' && type.kind !== 'struct') {
        throw new InlineMisuseError(
          'inline requested on a field not held by value',
          field.name,
          owner.type.name,
        );
      }

      if (!isZero(Reflect.get(site.target, field.name), type)) continue;

      if (directive.kind === 'named') {
        this.assignNamed(site, directive.name);
        continue;
      }

      switch (type.kind) {
        case 'struct':
          this.traverseInline(site, type);
          break;
        case 'interface':
          // Resolved in phase 2, once every concrete object exists.
          break;
        case 'map':
          this.makeMap(site);
          break;
        case 'record':
          this.assignRecord(site, type);
          break;
        default:
          throw new UnsupportedFieldError(
            'found inject directive on unsupported field',
            field.name,
            owner.type.name,
          );
      }
    }
  }

  private assignNamed(site: FieldSite, name: string): void {
    const { owner, field } = site;
    const existing = this.graph.lookup(name);

    if (!existing) {
      throw new MissingNamedError(name, field.name, owner.type.name);
    }

    if (!this.accepts(existing, site.type)) {
      throw new TypeMismatchError(
        name,
        existing.type.name,
        field.name,
        site.type.name,
        owner.type.name,
      );
    }

    this.assign(site, existing.value);
    this.graph.debug(`assigned ${existing} to field ${field.name} in ${owner}`);
    owner.addDependency(field.name, existing);
  }

  private traverseInline(site: FieldSite, type: StructType): void {
    const { owner, field, directive } = site;

    if (directive.kind === 'private') {
      throw new InlineMisuseError(
        'private inject cannot be used on an inline struct',
        field.name,
        owner.type.name,
      );
    }

    if (directive.kind !== 'inline') {
      throw new InlineMisuseError(
        'inline struct requires an explicit "inline" directive',
        field.name,
        owner.type.name,
      );
    }

    let nested: unknown = Reflect.get(site.target, field.name);
    if (nested === undefined || nested === null) {
      nested = this.construct(site, type.ctor, type.name);
      this.assign(site, nested);
    }

    this.provide(
      new GraphObject({ value: nested }, { isPrivate: true, embedded: field.embedded }),
    );
  }

  private makeMap(site: FieldSite): void {
    const { owner, field, directive } = site;

    if (directive.kind !== 'private') {
      throw new MapMisuseError(field.name, owner.type.name);
    }

    this.assign(site, new Map());
    this.graph.debug(`made map for field ${field.name} in ${owner}`);
  }

  private assignRecord(site: FieldSite, type: RecordType): void {
    const { owner, field, directive } = site;
    const isPrivate = directive.kind === 'private';

    if (isIntrinsic(type.ctor)) {
      throw new UnsupportedFieldError(
        `found inject directive on ${type.name} field`,
        field.name,
        owner.type.name,
      );
    }

    if (!isPrivate) {
      const existing = this.findShared(type);
      if (existing) {
        this.assign(site, existing.value);
        this.graph.debug(`assigned existing ${existing} to field ${field.name} in ${owner}`);
        owner.addDependency(field.name, existing);
        return;
      }
    }

    const created = new GraphObject(
      { value: this.construct(site, type.ctor, type.name) },
      { isPrivate, created: true },
    );
    this.provide(created);

    this.assign(site, created.value);
    this.graph.debug(`assigned newly created ${created} to field ${field.name} in ${owner}`);
    owner.addDependency(field.name, created);
  }

  /**
   * Exact-type index first, then a scan that also accepts subclasses and
   * objects provided after the index was built
   */
  private findShared(type: RecordType): GraphObject | undefined {
    const indexed = this.graph.indexed(type).find((object) => !object.isPrivate);
    if (indexed) return indexed;

    return this.graph.unnamed.find(
      (object) => !object.isPrivate && isAssignable(object.type, type),
    );
  }

  // ==================== Phase 2 ====================

  private populateInterfaces(owner: GraphObject): void {
    for (const site of this.sitesOf(owner)) {
      const { field, directive, type } = site;
      if (type.kind !== 'interface') continue;

      if (directive.kind === 'private') {
        throw new UnsupportedFieldError(
          'found private inject directive on interface field',
          field.name,
          owner.type.name,
        );
      }

      if (!isZero(Reflect.get(site.target, field.name), type)) continue;

      if (directive.kind !== 'plain') {
        throw new GraphInvariantError(
          `unhandled ${directive.kind} directive on interface field ${field.name} in type ${owner.type.name}`,
          { field: field.name, declaringType: owner.type.name },
        );
      }

      this.assignInterface(site, type);
    }
  }

  private assignInterface(site: FieldSite, type: InterfaceType): void {
    const { owner, field } = site;
    const candidates = this.graph.unnamed.filter(
      (object) => !object.isPrivate && implementsInterface(object.value, type),
    );

    if (candidates.length === 0) {
      throw new NoImplementationError(field.name, owner.type.name);
    }

    if (candidates.length > 1) {
      throw new AmbiguousImplementationError(
        field.name,
        owner.type.name,
        candidates.map((candidate) => candidate.toString()),
      );
    }

    const [existing] = candidates;
    this.assign(site, existing.value);
    this.graph.debug(`assigned existing ${existing} to interface field ${field.name} in ${owner}`);
    owner.addDependency(field.name, existing);
  }

  // ==================== Helpers ====================

  /**
   * Fields of an object that carry a directive. Named objects holding
   * anything but a class instance are leaf values and have none.
   */
  private *sitesOf(owner: GraphObject): Generator<FieldSite> {
    const target = owner.value;
    if (!isRecordReference(owner.type) || typeof target !== 'object' || target === null) {
      return;
    }

    for (const field of fieldsOf(target)) {
      const directive = this.parse(owner, field);
      if (!directive) continue;

      yield {
        owner,
        target,
        field,
        directive,
        type: fieldTypeOf(field.declared, directive.kind === 'inline'),
      };
    }
  }

  private parse(owner: GraphObject, field: FieldDefinition): Directive | null {
    try {
      return this.graph.directives.parse(field.annotation);
    } catch (error) {
      if (error instanceof MalformedDirectiveError) {
        throw new MalformedDirectiveError(error.annotation, error.reason, {
          field: field.name,
          declaringType: owner.type.name,
        });
      }
      throw error;
    }
  }

  /**
   * Interfaces are checked against the value, which may carry its methods
   * as own properties; everything else by runtime type
   */
  private accepts(object: GraphObject, type: TypeDescriptor): boolean {
    return type.kind === 'interface'
      ? implementsInterface(object.value, type)
      : isAssignable(object.type, type);
  }

  private construct(site: FieldSite, ctor: Function, typeName: string): unknown {
    try {
      return Reflect.construct(ctor, []);
    } catch (error) {
      throw new SynthesisError(typeName, site.field.name, site.owner.type.name, error);
    }
  }

  private assign(site: FieldSite, value: unknown): void {
    if (!Reflect.set(site.target, site.field.name, value)) {
      throw new InaccessibleFieldError(site.field.name, site.owner.type.name);
    }
  }

  private provide(object: GraphObject): void {
    this.graph.provide(object);
    this.queue.push(object);
  }
}

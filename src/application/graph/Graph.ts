/**
 * graphwire - Object Graph
 *
 * Holds every object of the graph and enforces the rules that apply when an
 * object is provided:
 *
 * - an object arrives unwired (empty `fields`)
 * - an unnamed object is a class instance
 * - at most one non-private unnamed object per class
 * - names are unique
 *
 * Population itself is delegated to the {@link Resolver}.
 *
 * The graph is synchronous and holds no locks; callers serialise access.
 *
 * @example
 * ```typescript
 * const graph = new Graph();
 * graph.provide(
 *   new GraphObject({ value: new App() }),
 *   new GraphObject({ value: new PostgresDatabase(), name: 'db' }),
 * );
 * graph.populate();
 * ```
 */

import { DirectiveCache } from '../../domain/directive';
import {
  DuplicateNameError,
  DuplicateTypeError,
  PreWiredObjectError,
  ShapeViolationError,
} from '../../domain/exceptions';
import { GraphObject } from '../../domain/graph';
import { isRecordReference, RecordType, TypeDescriptor } from '../../domain/types';
import { ILogger } from '../host/logger';
import { Resolver } from './Resolver';

/**
 * The contract the lifecycle container consumes
 */
export interface IGraph {
  provide(...objects: GraphObject[]): void;
  populate(): void;
}

/**
 * Graph configuration
 */
export interface GraphOptions {
  /** Receives a debug line for every provide and assignment */
  logger?: ILogger;
}

export class Graph implements IGraph {
  private readonly unnamedObjects: GraphObject[] = [];
  private readonly unnamedTypes = new Set<TypeDescriptor>();
  private readonly namedObjects = new Map<string, GraphObject>();
  private typeIndex?: Map<RecordType, GraphObject[]>;

  /** Parsed directives, shared by every field with the same annotation */
  readonly directives = new DirectiveCache();

  private readonly logger?: ILogger;

  constructor(options: GraphOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Add objects to the graph
   *
   * The whole batch is validated before any of it is added, so a rejected
   * call leaves the graph unchanged.
   *
   * @throws {PreWiredObjectError} An object already has recorded fields
   * @throws {ShapeViolationError} An unnamed value is not a class instance
   * @throws {DuplicateTypeError} A second shared unnamed object of one class
   * @throws {DuplicateNameError} A name is already taken
   */
  provide(...objects: GraphObject[]): void {
    const pendingTypes = new Set<TypeDescriptor>();
    const pendingNames = new Set<string>();

    for (const object of objects) {
      const type = object.type;

      if (object.fields.size > 0) {
        throw new PreWiredObjectError(object.toString());
      }

      if (!object.isNamed) {
        if (!isRecordReference(type)) {
          throw new ShapeViolationError(type.name, object.value);
        }
        if (!object.isPrivate) {
          if (this.unnamedTypes.has(type) || pendingTypes.has(type)) {
            throw new DuplicateTypeError(type.name);
          }
          pendingTypes.add(type);
        }
      } else {
        if (this.namedObjects.has(object.name) || pendingNames.has(object.name)) {
          throw new DuplicateNameError(object.name);
        }
        pendingNames.add(object.name);
      }
    }

    for (const object of objects) {
      if (object.isNamed) {
        this.namedObjects.set(object.name, object);
      } else {
        this.unnamedObjects.push(object);
        if (!object.isPrivate) this.unnamedTypes.add(object.type);
      }

      if (object.created) {
        this.debug(`created ${object}`);
      } else if (object.embedded) {
        this.debug(`provided embedded ${object}`);
      } else {
        this.debug(`provided ${object}`);
      }
    }
  }

  /**
   * Fill in every incomplete object
   *
   * Not transactional: on failure, assignments made before the error stay.
   */
  populate(): void {
    new Resolver(this).run();
  }

  /**
   * Every object except those provided for inline fields; unnamed objects in
   * provide order, then named ones
   */
  objects(): GraphObject[] {
    return [...this.unnamedObjects, ...this.namedObjects.values()].filter(
      (object) => !object.embedded,
    );
  }

  /**
   * Unnamed objects in provide order
   */
  get unnamed(): readonly GraphObject[] {
    return this.unnamedObjects;
  }

  /**
   * Named objects in provide order
   */
  get named(): ReadonlyMap<string, GraphObject> {
    return this.namedObjects;
  }

  lookup(name: string): GraphObject | undefined {
    return this.namedObjects.get(name);
  }

  /**
   * Shared unnamed objects of exactly `type`
   *
   * Served from an index built on first use. The index is not refreshed
   * afterwards: objects provided later are only found by a scan of
   * {@link unnamed}.
   */
  indexed(type: RecordType): readonly GraphObject[] {
    if (!this.typeIndex) {
      this.typeIndex = this.buildTypeIndex();
    }
    return this.typeIndex.get(type) ?? [];
  }

  private buildTypeIndex(): Map<RecordType, GraphObject[]> {
    const index = new Map<RecordType, GraphObject[]>();
    for (const object of this.unnamedObjects) {
      const type = object.type;
      if (object.isPrivate || !isRecordReference(type)) continue;

      const bucket = index.get(type);
      if (bucket) {
        bucket.push(object);
      } else {
        index.set(type, [object]);
      }
    }
    return index;
  }

  /** @internal */
  debug(message: string): void {
    this.logger?.debug(message);
  }
}

/**
 * Wire a set of values in one go: each is provided unnamed into a fresh
 * graph, which is then populated
 */
export function populate(...values: object[]): Graph {
  const graph = new Graph();
  for (const value of values) {
    graph.provide(new GraphObject({ value }));
  }
  graph.populate();
  return graph;
}

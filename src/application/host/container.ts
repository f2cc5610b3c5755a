/**
 * graphwire - Service Container
 *
 * Lifecycle wrapper around an object graph. Services are registered by id
 * (each becomes a named object), wired once on {@link Container.ready}, then
 * started in registration order. {@link Container.shutdown} stops them in the
 * same order.
 *
 * @example
 * ```typescript
 * const container = createContainer({ name: 'billing' });
 *
 * container.registerService('config', new AppConfig());
 * container.registerService('invoices', new InvoiceService());
 *
 * await container.ready();
 * const invoices = container.getServiceAs('invoices', InvoiceService);
 *
 * await container.shutdown();
 * ```
 */

import { GraphError } from '../../domain/exceptions';
import { GraphObject } from '../../domain/graph';
import { Constructor } from '../../domain/types';
import { Graph, IGraph } from '../graph/Graph';
import { consoleLogger, ILogger } from './logger';

/**
 * Lifecycle capability; values without it are wired but never started
 */
export interface IService {
  startup(): void | Promise<void>;
  shutdown(): void | Promise<void>;
}

export function isService(value: unknown): value is IService {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'startup') === 'function' &&
    typeof Reflect.get(value, 'shutdown') === 'function'
  );
}

/**
 * Container configuration
 */
export interface ContainerOptions {
  /** Container name, used in log lines */
  name?: string;

  /** Logger for lifecycle events */
  logger?: ILogger;

  /** Graph to register into; a fresh one by default */
  graph?: IGraph;

  /**
   * Hand the container's logger to the graph it creates, tracing every
   * resolution step. Defaults to on when NODE_ENV is `development`.
   */
  traceResolution?: boolean;
}

/**
 * Container status
 */
export type ContainerStatus = 'registering' | 'starting' | 'ready' | 'error';

/**
 * A service whose shutdown failed
 */
export interface ShutdownFailure {
  id: string;
  error: Error;
}

// ==================== Errors ====================

export class ContainerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContainerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ServiceRegistrationError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    cause: unknown,
  ) {
    super(`failed to register service ${serviceId}: ${messageOf(cause)}`, { cause });
    this.name = 'ServiceRegistrationError';
  }
}

export class ServiceNotFoundError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    detail = 'not found',
  ) {
    super(`service ${serviceId} ${detail}`);
    this.name = 'ServiceNotFoundError';
  }
}

export class ContainerPopulateError extends ContainerError {
  constructor(cause: unknown) {
    super(`failed to populate graph: ${messageOf(cause)}`, { cause });
    this.name = 'ContainerPopulateError';
  }
}

export class ServiceStartupError extends ContainerError {
  constructor(
    public readonly serviceId: string,
    cause: unknown,
  ) {
    super(`failed to start service ${serviceId}: ${messageOf(cause)}`, { cause });
    this.name = 'ServiceStartupError';
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ==================== Container ====================

export class Container {
  readonly name: string;
  private readonly graph: IGraph;
  private readonly logger: ILogger;
  private readonly order: string[] = [];
  private readonly services = new Map<string, unknown>();
  private _status: ContainerStatus = 'registering';
  private starting: Promise<void> | null = null;

  constructor(options: ContainerOptions = {}) {
    this.name = options.name ?? 'graphwire';
    this.logger = options.logger ?? consoleLogger;

    const trace = options.traceResolution ?? process.env.NODE_ENV === 'development';
    this.graph = options.graph ?? new Graph(trace ? { logger: this.logger } : {});
  }

  get status(): ContainerStatus {
    return this._status;
  }

  get isReady(): boolean {
    return this._status === 'ready';
  }

  /**
   * Register a service under a unique id
   *
   * @throws {ServiceRegistrationError} The graph rejected the value
   */
  registerService(id: string, service: unknown): void {
    if (this.isReady) {
      this.logger.warn(`registering service ${id} after container ${this.name} is ready`);
    }

    try {
      this.graph.provide(new GraphObject({ name: id, value: service }));
    } catch (error) {
      this.logger.error(`error providing service ${id}: ${messageOf(error)}`);
      throw new ServiceRegistrationError(id, error);
    }

    this.order.push(id);
    this.services.set(id, service);
  }

  /**
   * Wire the graph and start every service, once
   *
   * Concurrent callers share the same attempt. After a failure the next call
   * tries again.
   */
  ready(): Promise<void> {
    if (this.isReady) return Promise.resolve();

    if (!this.starting) {
      this.starting = this.start().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async start(): Promise<void> {
    this._status = 'starting';

    try {
      this.graph.populate();
    } catch (error) {
      this._status = 'error';
      throw new ContainerPopulateError(error);
    }

    for (const id of this.order) {
      const service = this.services.get(id);
      if (!isService(service)) continue;

      this.logger.info(`[starting up] ${id}`);
      try {
        await service.startup();
      } catch (error) {
        this._status = 'error';
        throw new ServiceStartupError(id, error);
      }
    }

    this._status = 'ready';
  }

  /**
   * @throws {ServiceNotFoundError} Nothing is registered under `id`
   */
  getService(id: string): unknown {
    if (!this.services.has(id)) {
      throw new ServiceNotFoundError(id);
    }
    return this.services.get(id);
  }

  /**
   * Typed lookup
   *
   * @throws {ServiceNotFoundError} Nothing is registered under `id`, or the
   *   service is not an instance of `type`
   */
  getServiceAs<T>(id: string, type: Constructor<T>): T {
    const service = this.getService(id);
    if (!(service instanceof type)) {
      throw new ServiceNotFoundError(id, `is not an instance of ${type.name}`);
    }
    return service;
  }

  tryGetService(id: string): unknown {
    return this.services.get(id);
  }

  /**
   * Ids in registration order
   */
  serviceIds(): string[] {
    return [...this.order];
  }

  /**
   * Stop every service in registration order
   *
   * A failing service is logged and skipped; the sweep always completes.
   *
   * @returns The services whose shutdown failed
   */
  async shutdown(): Promise<ShutdownFailure[]> {
    const failures: ShutdownFailure[] = [];

    for (const id of this.order) {
      const service = this.services.get(id);
      if (!isService(service)) continue;

      this.logger.info(`[shutting down] ${id}`);
      try {
        await service.shutdown();
      } catch (error) {
        this.logger.error(`[shutting down] ${id}: ${messageOf(error)}`);
        failures.push({ id, error: toError(error) });
      }
    }

    this._status = 'registering';
    return failures;
  }
}

/**
 * Create a new container
 */
export function createContainer(options?: ContainerOptions): Container {
  return new Container(options);
}

/**
 * Whether an error came from the graph rather than from a service
 */
export function isWiringError(error: unknown): boolean {
  return (
    error instanceof GraphError ||
    (error instanceof ContainerError && error.cause instanceof GraphError)
  );
}

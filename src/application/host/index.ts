/**
 * graphwire - Hosting Module
 *
 * Service lifecycle and logging
 */

// Logging
export type { ILogger } from './logger';
export { consoleLogger, silentLogger } from './logger';

// Container
export type {
  IService,
  ContainerOptions,
  ContainerStatus,
  ShutdownFailure,
} from './container';

export {
  Container,
  ContainerError,
  ServiceRegistrationError,
  ServiceNotFoundError,
  ContainerPopulateError,
  ServiceStartupError,
  createContainer,
  isService,
  isWiringError,
} from './container';

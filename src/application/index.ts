/**
 * @module graphwire/application
 * @description Application layer exports
 */

// ============================================================================
// Field Registration
// ============================================================================

export * from './di';

// ============================================================================
// Graph & Resolver
// ============================================================================

export * from './graph';

// ============================================================================
// Container & Logging
// ============================================================================

export * from './host';

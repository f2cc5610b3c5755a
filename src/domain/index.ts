/**
 * @module graphwire/domain
 * @description Domain layer exports
 */

// ============================================================================
// Type Descriptors
// ============================================================================

export * from './types';

// ============================================================================
// Directives
// ============================================================================

export * from './directive';

// ============================================================================
// Graph Objects
// ============================================================================

export * from './graph';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';

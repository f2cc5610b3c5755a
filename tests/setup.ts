/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers for graph errors.
 */

import 'reflect-metadata';
import { GraphError, GraphErrorCode } from '../src';

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R, T = {}> {
      /**
       * Check if the function throws an error of a specific class
       * @param expected Error constructor
       */
      toThrowErrorType(expected: abstract new (...args: never[]) => Error): R;

      /**
       * Check if the function throws a graph error with the given code
       * @param code Expected error code
       */
      toThrowGraphError(code: GraphErrorCode): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

function capture(received: () => unknown): { thrown: boolean; error: unknown } {
  try {
    received();
    return { thrown: false, error: undefined };
  } catch (error) {
    return { thrown: true, error };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => unknown, expected: abstract new (...args: never[]) => Error) {
    const { thrown, error } = capture(received);
    if (!thrown) {
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    }

    const pass = error instanceof expected;
    return {
      pass,
      message: () =>
        pass
          ? `Expected function not to throw ${expected.name}`
          : `Expected function to throw ${expected.name}, but it threw ${describeError(error)}`,
    };
  },

  /**
   * Check if thrown error is a graph error carrying the given code
   */
  toThrowGraphError(received: () => unknown, code: GraphErrorCode) {
    const { thrown, error } = capture(received);
    if (!thrown) {
      return {
        pass: false,
        message: () => `Expected function to throw ${code}, but it didn't throw`,
      };
    }

    const pass = error instanceof GraphError && error.code === code;
    return {
      pass,
      message: () =>
        pass
          ? `Expected function not to throw ${code}`
          : `Expected function to throw ${code}, but it threw ${describeError(error)}`,
    };
  },
});

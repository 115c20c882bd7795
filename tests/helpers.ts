/**
 * Shared test helpers
 */

import { ILogger } from '../src';

/**
 * Runs `fn` and returns what it threw, narrowed to `type`.
 * Fails the test when nothing (or something else) is thrown.
 */
export function catchError<E extends Error>(
  fn: () => unknown,
  type: new (...args: any[]) => E,
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected function to throw ${type.name}`);
}

/**
 * Logger whose methods are jest mocks
 */
export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Custom Vitest matchers for generated fixtures
 */

import { expect } from 'vitest';
import { toBeValidEmail, toBeValidUUID } from './core-matchers';
import { toBeDistinct, toBeStrictlyIncreasing } from './advanced-matchers';

interface CustomMatchers<R = unknown> {
  /** Assert array contains only distinct values */
  toBeDistinct: () => R;

  /** Assert array of numbers or bigints is strictly increasing */
  toBeStrictlyIncreasing: () => R;

  /** Assert value is a valid email address */
  toBeValidEmail: () => R;

  /** Assert value is a valid UUID */
  toBeValidUUID: () => R;
}

declare module 'vitest' {
  interface Assertion<T> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}

expect.extend({
  toBeDistinct,
  toBeStrictlyIncreasing,
  toBeValidEmail,
  toBeValidUUID,
});

export { type CustomMatchers };

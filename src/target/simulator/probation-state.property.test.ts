/**
 * Property-based tests for probation locks
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { propertyTestConfig } from '../test-setup.js';
import { ProbationState } from './probation-state.js';

describe('ProbationState property tests', () => {
  it('should never promote a system while a lock is held', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 60000 }),
        fc.array(fc.integer({ min: 0, max: 600000 }), { minLength: 1, maxLength: 20 }),
        async (periodMs, offsets) => {
          const probation = new ProbationState(periodMs, 0);
          probation.install(0);
          if (probation.acquire('holder', 0) !== 'locked') {
            return false;
          }

          return offsets.every(offset => {
            probation.settle(offset);
            return probation.snapshot().kind === 'tried';
          });
        },
      ),
      propertyTestConfig,
    );
  });

  it('should leave status and index alone when a good system is locked', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 60000 }),
        fc.integer({ min: 0, max: 60000 }),
        async (periodMs, extraMs) => {
          const probation = new ProbationState(periodMs, 0);
          probation.install(0);
          probation.settle(periodMs);
          const index = probation.systemIndex;

          const result = probation.acquire('holder', periodMs + extraMs);

          return (
            result === 'ignored' &&
            probation.snapshot().kind === 'good' &&
            probation.systemIndex === index &&
            probation.lockCount() === 0
          );
        },
      ),
      propertyTestConfig,
    );
  });
});

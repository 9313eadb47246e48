/**
 * Garbage collection counter tests
 */

import { constants } from 'perf_hooks';
import { GcCounter } from '../../src/utils/gc-counter';

describe('GcCounter', () => {
  let counter: GcCounter;

  beforeEach(() => {
    counter = new GcCounter();
  });

  afterEach(() => {
    counter.stop();
  });

  it('should count collections by kind', () => {
    counter.record(constants.NODE_PERFORMANCE_GC_MINOR);
    counter.record(constants.NODE_PERFORMANCE_GC_MINOR);
    counter.record(constants.NODE_PERFORMANCE_GC_MAJOR);
    counter.record(constants.NODE_PERFORMANCE_GC_INCREMENTAL);
    counter.record(constants.NODE_PERFORMANCE_GC_WEAKCB);

    expect(counter.snapshot()).toEqual({ minor: 2, major: 1, incremental: 1, weakCallbacks: 1 });
  });

  it('should ignore entries without a known kind', () => {
    counter.record(undefined);
    counter.record(-1);

    expect(counter.snapshot()).toEqual({ minor: 0, major: 0, incremental: 0, weakCallbacks: 0 });
  });

  it('should return a copy of the counts', () => {
    const snapshot = counter.snapshot();
    snapshot.minor = 99;

    expect(counter.snapshot().minor).toBe(0);
  });

  it('should tolerate repeated start and stop calls', () => {
    expect(() => {
      counter.start();
      counter.start();
      counter.stop();
      counter.stop();
    }).not.toThrow();
  });
});

/**
 * Global Jest setup.
 *
 * Suites that switch to fake timers must not leak them into the next test.
 */

afterEach(() => {
  jest.useRealTimers();
  jest.restoreAllMocks();
});

/**
 * Jest Test Setup
 * Runs after the test framework is installed.
 */

jest.setTimeout(10000);

afterEach(() => {
  jest.clearAllMocks();
  jest.useRealTimers();
});

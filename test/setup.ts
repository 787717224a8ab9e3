// Jest global setup file
// Runs before every test file, ahead of any module under test

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent'; // Suppress logs during tests
process.env.ENABLE_TELEMETRY = 'false';

// Keep test output clean
global.console = {
  ...console,
  warn: jest.fn(),
  error: jest.fn(),
};

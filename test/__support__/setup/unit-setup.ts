import { jest } from '@jest/globals';

// Global test timeout for unit tests
jest.setTimeout(10000);

// Loggers created by the code under test stay quiet unless a test asks otherwise
process.env.LOG_LEVEL = 'silent';

export {};

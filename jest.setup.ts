// Jest setup file for test configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.TX_RETRY_DELAY_MS = '1';

jest.setTimeout(10000);

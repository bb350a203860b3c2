// Jest setup file
import { LogLevel, logger } from '../utils/logger';

// Mock console methods to avoid spam during tests
global.console = {
  ...console,
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

// Set test timeout
jest.setTimeout(30000);

// Clean up after each test
afterEach(() => {
  jest.clearAllMocks();
  logger.setLogLevel(LogLevel.INFO);
});

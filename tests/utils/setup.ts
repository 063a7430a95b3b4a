/**
 * Configuration for test environment setup
 */
import { LoggerManager } from '../../lib/pulsegraph/src/utils/logging';
import { TestLoggerAdapter } from './test-logger-adapter';

// Nodes and pipelines without an explicit logger write here
const testLogger = new TestLoggerAdapter();
LoggerManager.getInstance().setLogger(testLogger);

// Always disable logs in tests; tests that inspect logs pass their own logger
LoggerManager.disableLogs();

beforeEach(() => {
  testLogger.clear();
});

process.env.NODE_ENV = 'test';

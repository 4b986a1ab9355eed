/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = (event_type: string, metadata?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@kindred/logger/mock';
 *
 * const mockLogger = createMockLogger();
 * render('let &n = [1, 2]; *n', { logger: mockLogger });
 *
 * expect(mockLogger.debug).toHaveBeenCalledWith('scope_expanded', {
 *   factor: 2,
 *   refs: ['n'],
 *   line: 1,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a new mock logger that also has spy functions
    child: vi.fn<(metadata: Record<string, unknown>) => MockLogger>(() => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };
}

import { vi } from 'vitest';

/**
 * Module factory for vi.mock('../../src/utils/logger.js', ...)
 */
export function loggerMockFactory() {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);

  return {
    logger,
    createChildLogger: vi.fn(() => logger),
  };
}

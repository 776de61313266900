import { vi } from 'vitest'

// Tool paths must resolve through PATH in tests
delete process.env.DIALS_INSTALL_ROOT

vi.mock('../src/helpers/loggers.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
  },
  configureLogFiles: vi.fn()
}))

/**
 * Vitest Test Setup
 *
 * Loaded before every test file. Loads .env and resets the global logger
 * so log output never leaks between files.
 */

import { afterEach } from 'vitest'
import { config } from 'dotenv'
import { noopLogger, setLogger } from '../src/utils/logger'

// Load environment variables from .env file
config()

afterEach(() => {
  setLogger(noopLogger)
})

/**
 * Container health check: exits 0 when the persisted check counters can be
 * read, 1 otherwise.
 */

import { closePool } from './data/database.js';
import { PgCheckRunStore } from './data/repositories/check-run.repository.js';
import { errorMessage, logger } from './utils/logger.js';

async function checkHealth(): Promise<number> {
  try {
    const run = await new PgCheckRunStore().getCheckRun();
    return run.totalChecks >= 0 ? 0 : 1;
  } catch (error) {
    logger.error('Health check failed', { error: errorMessage(error) });
    return 1;
  } finally {
    await closePool();
  }
}

checkHealth()
  .then(code => process.exit(code))
  .catch(() => process.exit(1));

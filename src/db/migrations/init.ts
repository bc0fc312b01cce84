#!/usr/bin/env node

/**
 * Database Migration Runner
 *
 * Creates the ledger and receipt tables if they do not exist
 */

import db, { initializeDatabase } from '../connection';
import logger from '../../utils/logger';

/**
 * Main migration function
 */
async function runMigrations(): Promise<void> {
  try {
    logger.start('Database migrations');
    await initializeDatabase();
    logger.complete('Database migrations');
  } finally {
    await db.close();
  }
}

// Run migrations if this file is executed directly
if (require.main === module) {
  runMigrations().catch(error => {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  });
}

export default runMigrations;

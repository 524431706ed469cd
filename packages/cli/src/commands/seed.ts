/**
 * Seed command - insert the sample person and their comments
 */

import { Command } from 'commander';
import {
  SAMPLE_PERSON,
  closeLogger,
  createStoragePool,
  type DatabaseConfig,
  type Logger,
  type SeedResult,
  type StoragePool,
  type StorageStats,
} from '@roster/core';
import type { SeedPerson } from '@roster/types';
import { loadProject, type ProjectOptions } from './shared.js';
import { exitWithFailure } from '../utils/errorFormatter.js';

export interface SeedSummary extends SeedResult {
  /** Totals after seeding */
  stats: StorageStats;
}

/**
 * Insert `data` (the sample person by default) in one transaction.
 */
export async function seedDatabase(
  pool: StoragePool,
  logger: Logger,
  data: SeedPerson = SAMPLE_PERSON
): Promise<SeedSummary> {
  return pool.use(async (storage) => {
    const result = await storage.seed(data);
    const stats = await storage.getStats();
    logger.info('Seeded person', {
      id: result.person.id,
      name: `${result.person.firstName} ${result.person.lastName}`,
      comments: result.comments.length,
      totalPeople: stats.personCount,
    });
    return { ...result, stats };
  });
}

/**
 * Open the project's database, seed it, then drain the pool and close the
 * logger whether or not seeding succeeded.
 */
export async function seedProject(
  database: DatabaseConfig,
  logger: Logger,
  data: SeedPerson = SAMPLE_PERSON
): Promise<SeedSummary> {
  const pool = createStoragePool(database, { logger });
  try {
    return await seedDatabase(pool, logger, data);
  } finally {
    await pool.drain();
    await closeLogger(logger);
  }
}

export const seedCommand = new Command('seed')
  .description('Insert sample data (one person with two comments)')
  .option('-p, --project <path>', 'Project path', '.')
  .action(async (options: ProjectOptions) => {
    const { config, logger } = loadProject(options);

    let summary: SeedSummary;
    try {
      summary = await seedProject(config.database, logger);
    } catch (err) {
      exitWithFailure(err, ['Check database.path in .roster/config.yaml']);
    }

    const { person, comments, stats } = summary;
    console.log(`✓ Seeded ${person.email} with ${comments.length} comments`);
    console.log(`  Database now holds ${stats.personCount} people and ${stats.commentCount} comments`);
  });

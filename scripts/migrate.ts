async function main() {
  process.env.STORAGE_DRIVER = 'postgres';
  process.env.DATABASE_URL =
    process.env.DATABASE_URL ?? 'postgresql://localhost:5432/makerspace';
  process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

  const { closeDb, logger, runMigrations } = await import('@makerspace/shared');

  logger.info('Starting migrations');
  const applied = await runMigrations();
  await closeDb();
  logger.info({ applied }, 'Migrations finished');
}

main().catch(async (error) => {
  const { logger } = await import('@makerspace/shared');
  logger.error({ err: error }, 'Migration runner failed');
  process.exit(1);
});

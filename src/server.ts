import 'reflect-metadata';
import AppDataSource from './ormconfig';
import { loadConfig } from './config';
import { createApp } from './app';
import { ensureAdminAccount } from './seeds/bootstrap';

async function main() {
  const config = loadConfig();

  await AppDataSource.initialize();
  console.log('DB initialized');

  if (config.runMigrationsOnStart) {
    console.log('Running migrations...');
    await AppDataSource.runMigrations();
    console.log('Migrations complete');
  }

  await ensureAdminAccount(AppDataSource, config);

  const app = createApp(AppDataSource, { config });
  app.listen(config.port, () => console.log(`Server listening at http://localhost:${config.port}`));
}

main().catch(err => {
  console.error('Startup error', err);
  process.exit(1);
});

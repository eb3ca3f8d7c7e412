import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { loadConfig, DatabaseConfig } from './config';
import { entities } from './entities';
import { CreateCoreStackTables1700000000000 } from './migrations/1700000000000-CreateCoreStackTables';

export function postgresOptions(db: DatabaseConfig): DataSourceOptions {
  const connection = db.url
    ? { url: db.url }
    : { host: db.host, port: db.port, username: db.username, password: db.password, database: db.database };
  return {
    type: 'postgres',
    ...connection,
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
    entities,
    migrations: [CreateCoreStackTables1700000000000],
    synchronize: false,
    logging: db.logging,
  };
}

const AppDataSource = new DataSource(postgresOptions(loadConfig().database));

export default AppDataSource;

import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config, type AppConfig } from './config';
import { entities } from './entities';
import { CreateInitialTables1680000000000 } from './migrations/1680000000000-CreateInitialTables';

export function createDataSource(cfg: AppConfig = config): DataSource {
  const db = cfg.database;
  if (db.driver === 'sqljs') {
    return new DataSource({
      type: 'sqljs',
      logging: db.logging,
      synchronize: true,
      entities,
    });
  }
  return new DataSource({
    type: 'postgres',
    ...(db.url
      ? { url: db.url }
      : { host: db.host, port: db.port, username: db.username, password: db.password, database: db.name }),
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
    logging: db.logging,
    synchronize: false,
    entities,
    migrations: [CreateInitialTables1680000000000],
  });
}

// used by the server, the seed script and the typeorm CLI
const AppDataSource = createDataSource();

export default AppDataSource;

import { Global, Inject, Injectable, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { DATABASE_CONNECTION } from './database.tokens';
import { migrateDatabase } from './migrate';
import { DEFAULT_STORE_CONNECTION } from '../config/config.constants';

const IN_MEMORY = ':memory:';

/**
 * Opens the store and brings its schema up to date.
 */
export function openDatabase(connection: string): Database.Database {
  if (connection !== IN_MEMORY) {
    mkdirSync(dirname(connection), { recursive: true, mode: 0o700 });
  }

  const db = new Database(connection);
  if (connection !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  migrateDatabase(db);
  return db;
}

const databaseProvider = {
  provide: DATABASE_CONNECTION,
  useFactory: (configService: ConfigService): Database.Database => {
    const connection = configService.get<string>('certd.store.connection') ?? DEFAULT_STORE_CONNECTION;
    const db = openDatabase(connection);
    new Logger('DatabaseModule').log(`Certificate store opened at ${connection}`);
    return db;
  },
  inject: [ConfigService],
};

@Injectable()
class DatabaseShutdown implements OnApplicationShutdown {
  private readonly logger = new Logger('DatabaseModule');

  constructor(@Inject(DATABASE_CONNECTION) private readonly db: Database.Database) {}

  onApplicationShutdown(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.log('Certificate store closed');
    }
  }
}

@Global()
@Module({
  providers: [databaseProvider, DatabaseShutdown],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule {}

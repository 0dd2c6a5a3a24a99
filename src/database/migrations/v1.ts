/**
 * Migration v1: certificate store
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index';
import { SCHEMA_SQL } from '../schema';

const migration: Migration = {
  version: 1,
  description: 'Create certificate, binding, renewal, reload and alarm tables',
  up(db: Database.Database): void {
    db.exec(SCHEMA_SQL);
  },
};

export default migration;

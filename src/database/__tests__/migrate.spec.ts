import Database from 'better-sqlite3';
import { migrateDatabase } from '../migrate';
import { LATEST_VERSION, getSchemaVersion } from '../migrations';

describe('migrateDatabase', () => {
  let db: Database.Database;

  const tableNames = (): string[] =>
    db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map((row) => row.name);

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should create the full schema on a new database', () => {
    migrateDatabase(db);

    expect(getSchemaVersion(db)).toBe(LATEST_VERSION);
    expect(tableNames()).toEqual([
      'certificate_events',
      'certificate_files',
      'certificate_renewals',
      'certificates',
      'service_alarms',
      'service_certificates',
      'service_reloads',
    ]);
  });

  it('should leave an up-to-date database alone', () => {
    migrateDatabase(db);
    db.prepare("INSERT INTO service_alarms (service_name, domain, message, attempts, raised_at) VALUES ('mail', 'test.local', 'down', 1, '2026-01-01T00:00:00.000Z')").run();

    migrateDatabase(db);

    expect(getSchemaVersion(db)).toBe(1);
    expect(db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM service_alarms').get()?.cnt).toBe(1);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { listMigrations } from '../migrate.js';

describe('listMigrations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'user-service-migrations-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should order .sql files by numeric version', async () => {
    await writeFile(join(dir, '010_add_index.sql'), '');
    await writeFile(join(dir, '002_add_phone.sql'), '');
    await writeFile(join(dir, '001_create_users.sql'), '');
    await writeFile(join(dir, 'README.md'), '');

    const migrations = await listMigrations(dir);

    expect(migrations).toEqual([
      { filename: '001_create_users.sql', version: 1 },
      { filename: '002_add_phone.sql', version: 2 },
      { filename: '010_add_index.sql', version: 10 },
    ]);
  });

  it('should reject a .sql file without a version prefix', async () => {
    await writeFile(join(dir, 'create_users.sql'), '');

    await expect(listMigrations(dir)).rejects.toThrow('Invalid migration filename: create_users.sql');
  });

  it('should find the shipped users migration', async () => {
    const shipped = fileURLToPath(new URL('../migrations', import.meta.url));

    const migrations = await listMigrations(shipped);

    expect(migrations[0]).toEqual({ filename: '001_create_users.sql', version: 1 });
  });
});

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { migrate, SCHEMA_VERSION } from './migrations.js';

describe('migrate', () => {
  it('applies pending migrations once', () => {
    const sqlite = new Database(':memory:');

    expect(migrate(sqlite)).toEqual([SCHEMA_VERSION]);
    expect(migrate(sqlite)).toEqual([]);

    const tables = sqlite
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .pluck()
      .all();
    expect(tables).toEqual(['genes', 'lof_variants', 'missense_variants', 'penetrance_estimates', 'schema_versions']);
    sqlite.close();
  });

  it('enforces the review-star range', () => {
    const sqlite = new Database(':memory:');
    migrate(sqlite);

    const insert = sqlite.prepare(
      `INSERT INTO missense_variants (gene, hgvs_p, clinvar_stars, created_at, updated_at)
       VALUES ('KCNH2', ?, ?, '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')`
    );
    insert.run('p.Ala561Val', 4);
    expect(() => insert.run('p.Ala561Thr', 5)).toThrow(/CHECK constraint failed/);
    sqlite.close();
  });
});

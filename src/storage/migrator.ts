// Движок миграций для PostgreSQL.
import type postgres from 'postgres';
import initialMigration from './migrations/001_initial.js';

// Интерфейс миграции.
export interface Migration {
  name: string;
  up(sql: postgres.Sql): Promise<void>;
}

// Все миграции схемы в порядке применения.
export const migrations: Migration[] = [initialMigration];

async function ensureMigrationsTable(sql: postgres.Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
}

// Возвращает список имен примененных миграций.
export async function getAppliedMigrations(sql: postgres.Sql): Promise<string[]> {
  await ensureMigrationsTable(sql);

  const rows = await sql<{ name: string }[]>`
    SELECT name FROM _migrations ORDER BY applied_at
  `;

  return rows.map((row) => row.name);
}

// Применяет непримененные миграции последовательно; запись в _migrations — после успешного up.
export async function runMigrations(
  sql: postgres.Sql,
  list: Migration[] = migrations,
): Promise<string[]> {
  await ensureMigrationsTable(sql);

  const applied = new Set(await getAppliedMigrations(sql));
  const newlyApplied: string[] = [];

  for (const migration of list) {
    if (applied.has(migration.name)) {
      continue;
    }

    await migration.up(sql);
    await sql`
      INSERT INTO _migrations (name) VALUES (${migration.name})
    `;
    newlyApplied.push(migration.name);
  }

  return newlyApplied;
}

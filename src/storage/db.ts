// Подключение к PostgreSQL для postgres-бэкенда и команды index.
import postgres from 'postgres';
import type { DatabaseConfig } from '../config/schema.js';

// Создает подключение к PostgreSQL; max ограничивает пул под параллельные запросы батча.
export function createDb(config: DatabaseConfig, max = 10): postgres.Sql {
  return postgres({
    host: config.host,
    port: config.port,
    database: config.name,
    username: config.user,
    password: config.password,
    max,
    onnotice: () => { /* Подавляем NOTICE от PostgreSQL (например CREATE IF NOT EXISTS). */ },
  });
}

export async function closeDb(sql: postgres.Sql): Promise<void> {
  await sql.end();
}

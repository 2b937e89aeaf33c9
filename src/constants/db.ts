/**
 * Database constants
 */

export const DB_PATH_ENV = "DB_PATH";

/**
 * Default database file, relative to cwd
 */
export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Directory holding the SQL migrations, relative to cwd
 */
export const MIGRATIONS_DIR = "migrations";

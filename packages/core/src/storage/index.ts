/**
 * Storage — SQLite database and migrations.
 */

export { openDatabase } from './database.js'
export { runMigrations, getSchemaVersion, LATEST_SCHEMA_VERSION } from './migrations.js'

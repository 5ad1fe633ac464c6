/**
 * Root test setup file
 *
 * Runs before every test file: keeps the logger quiet and away from disk.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_FILE = 'false';
process.env.LOG_LEVEL ??= 'warn';

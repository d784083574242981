/**
 * test/setup-env.ts
 *
 * Runs before every spec file. Keeps relaxed-mode warnings out of test output;
 * specs that assert on log events spy on the logger instead.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

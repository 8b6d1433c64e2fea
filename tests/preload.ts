/**
 * Root-level preload script for test environment setup
 *
 * Sets environment variables before any modules are loaded.
 * Required because the shared loggers read LOG_LEVEL at module load time.
 */
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
process.env.SERVICE_TIMEZONE = process.env.SERVICE_TIMEZONE ?? "UTC";

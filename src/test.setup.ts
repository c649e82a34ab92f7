// Keep pino on its synchronous destination and quiet during Vitest runs.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
process.env.STORAGE_DRIVER = 'memory';
process.env.EVENT_BUS_DRIVER = 'in-memory';
process.env.METRICS_ENABLED = 'true';
process.env.LOCK_TIMEOUT_MS = process.env.LOCK_TIMEOUT_MS ?? '1000';

// Global test setup: runs before all test files.
// Sets NODE_ENV to test so env validation picks it up.
process.env.NODE_ENV = 'test';
process.env.DATABASE_FILE = ':memory:';
process.env.LOG_LEVEL = 'silent';
process.env.MOCK_API_FAILURE_RATE = '0';
process.env.DAILY_PULL_ENABLED = 'false';

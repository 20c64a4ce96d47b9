// Runs before every test file, ahead of any module that reads the environment
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

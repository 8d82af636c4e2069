// Shared Jest setup for all workspace packages

// Socket round-trips and the sustained benchmark run in real time
jest.setTimeout(30000);

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

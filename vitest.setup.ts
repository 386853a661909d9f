export {};

process.env.NODE_ENV = 'test';

// Keep the shared logger quiet unless a run asks for more.
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}

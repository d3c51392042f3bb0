// Loaded before every test file (vitest setupFiles). Keeps the winston logger silent.
process.env.NODE_ENV = 'test';

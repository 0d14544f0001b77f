import { beforeAll } from '@jest/globals';
import chalk from 'chalk';

// Assertions compare plain text
chalk.level = 0;

beforeAll(() => {
  process.env.NODE_ENV = 'test';
  // Keep developer environment from leaking into resolved configuration
  delete process.env.NGINX_CONF;
  delete process.env.SIMP_LE;
});

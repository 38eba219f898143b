import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const src = (dir = '') => fileURLToPath(new URL(dir ? `./src/${dir}` : './src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core': src('core'),
      '@config': src('config'),
      '@plugins': src('plugins'),
      '@routes': src('routes'),
      '@services': src('services'),
      '@utils': src('utils'),
      '@': src(),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});

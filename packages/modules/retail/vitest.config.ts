import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@unitecon/shared': path.resolve(__dirname, '../../shared/src'),
      '@unitecon/core': path.resolve(__dirname, '../../core/src'),
    },
  },
  test: {
    environment: 'node',
  },
});

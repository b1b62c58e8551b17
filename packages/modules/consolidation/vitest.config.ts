import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@unitecon/shared': path.resolve(__dirname, '../../shared/src'),
      '@unitecon/core': path.resolve(__dirname, '../../core/src'),
      '@unitecon/module-jewelry': path.resolve(__dirname, '../jewelry/src'),
      '@unitecon/module-retail': path.resolve(__dirname, '../retail/src'),
      '@unitecon/module-yoga': path.resolve(__dirname, '../yoga/src'),
    },
  },
  test: {
    environment: 'node',
  },
});

import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    root: path.resolve(__dirname),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@logic-tensors/core': path.resolve(__dirname, '../core/src/index.ts'),
      '@logic-tensors/operators': path.resolve(__dirname, '../operators/src/index.ts'),
      '@logic-tensors/engine': path.resolve(__dirname, '../engine/src/index.ts'),
      '@logic-tensors/knowledge': path.resolve(__dirname, '../knowledge/src/index.ts'),
    },
  },
});

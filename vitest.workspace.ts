import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/operators',
  'packages/engine',
  'packages/knowledge',
]);

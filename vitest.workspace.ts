import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/cli',
  'packages/matcher',
  'packages/shared',
  'packages/source',
]);

import os from 'node:os';
import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    env: {
      RELAY_LOG_DIR: path.join(os.tmpdir(), 'outbound-relay-test-logs'),
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Ack timeouts in the session tests run on real timers
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/test-support/**',
        // Needs a Bluetooth adapter
        'src/transport/noble-transport.ts',
        'src/cli.ts',
      ],
    },
  },
});

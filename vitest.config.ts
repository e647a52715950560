import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**/*.ts',
        'src/index.ts', // Entry point
        'src/discord/commands/**', // Slash command handlers - exercised against a live guild
        'src/services/discord.ts', // Discord client bootstrap
      ],
    },
    testTimeout: 10000,
  },
});

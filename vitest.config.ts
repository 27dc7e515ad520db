import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageSource = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@reasoning-relay/chat-contract': packageSource('chat-contract'),
      '@reasoning-relay/chat-llm': packageSource('chat-llm'),
      '@reasoning-relay/chat-orchestrator': packageSource('chat-orchestrator'),
      '@reasoning-relay/chat-relay-api': packageSource('chat-relay-api'),
      '@reasoning-relay/test-support': packageSource('test-support'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});

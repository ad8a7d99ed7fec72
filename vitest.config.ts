import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        include: ['packages/*/tests/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            PRETTY_LOGS: 'false',
            LOG_LEVEL: 'silent',
        },
        testTimeout: 10_000,
    },
})

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.spec.ts'],
        // Keep the developer's .env out of the test runs
        env: {
            LOG_LEVEL: 'silent',
            DB_PATH: ':memory:',
            EXPIRY_SWEEP_SECONDS: '0',
        },
    },
});

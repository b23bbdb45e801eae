import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/quizpilot/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
        },
    },
});

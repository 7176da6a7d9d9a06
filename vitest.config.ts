import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        exclude: ['**/node_modules/**', '**/dist/**'],
        env: {
            RAIL_LOG_LEVEL: 'silent',
        },
    },
});

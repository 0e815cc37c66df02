import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts', 'engine/src/**/*.test.ts'],
        environment: 'node',
        testTimeout: 15000
    }
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['backend/src/**/*.test.ts'],
        setupFiles: ['backend/src/__tests__/setup.ts']
    }
});

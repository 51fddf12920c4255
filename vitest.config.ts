import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        setupFiles: ['./src/setupTests.ts'],
        globals: true,
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts', 'main/**/*.ts'],
            exclude: [
                '**/*.test.*',
                '**/setupTests.*',
                'src/test-utils/**',
            ],
            reporter: ['text', 'text-summary'],
            thresholds: {
                lines: 70,
                functions: 70,
                branches: 65,
                statements: 70,
            },
        },
    },
});

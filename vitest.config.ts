import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // In-page scripts run against a DOM
        environmentMatchGlobs: [
            ['tests/dom/**', 'jsdom']
        ],
        exclude: ['node_modules/', 'dist/'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            include: ['src/**/*.ts'],
            exclude: ['src/cli/**', 'src/detector/adapters/playwright/**']
        }
    }
});

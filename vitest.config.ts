import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['test/**/*.test.ts'],
        testTimeout: 20000,
        hookTimeout: 10000,
        pool: 'forks', // Child processes are spawned by some suites
        poolOptions: {
            forks: {
                singleFork: true // Run tests sequentially; the web suites bind ports
            }
        },
        coverage: {
            provider: 'v8',
            reporter: ['text', 'text-summary', 'html'],
            include: ['server/**/*.ts'],
            exclude: ['server/index.ts'],
            reportsDirectory: './coverage'
        }
    }
});

import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * Tests are colocated with the code they cover in `__tests__/` directories
 * inside each workspace package. Running `npm test` from the root runs every
 * package's tests in a single pass.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/**/src/**/__tests__/**/*.test.ts'],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        reporters: 'default',
        env: {
            NODE_ENV: 'test'
        }
    }
});

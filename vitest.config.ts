/**
 * Vitest Configuration
 *
 * Unit tests only: upsd is replaced by an in-memory transport, the socket transport
 * talks to a loopback server, and the process transport spawns the Node executable.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        testTimeout: 5000,
        hookTimeout: 5000,
        reporters: 'default',
    },
});

import { fileURLToPath } from 'node:url';

import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    build: {
        outDir: 'dist',
        target: 'node20',
        lib: {
            entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
            formats: ['es'],
            fileName: 'index',
        },
        rollupOptions: {
            external: ['sharp', /^node:/],
        },
    },
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        exclude: configDefaults.exclude,
        testTimeout: 30_000,
    },
});

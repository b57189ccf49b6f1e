import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

export default defineConfig({
    build: {
        target: 'node20',
        ssr: true,
        rollupOptions: {
            input: {
                index: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
            },
            external: [
                // Node.js built-ins
                /^node:/,
                // Fastify and plugins (don't bundle well)
                'fastify',
                '@fastify/cors',
                '@fastify/helmet',
                '@fastify/websocket',
                'postgres',
            ],
            output: {
                format: 'es',
                entryFileNames: '[name].js',
            },
        },
        outDir: 'dist',
        emptyOutDir: true,
        minify: false,
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
    root: 'src/app',
    build: {
        outDir: '../../dist',
        emptyOutDir: true
    },
    server: {
        port: 5173
    },
    // The Vite root is src/app; aliases are declared in the tsconfig.json at the repository root.
    plugins: [tsconfigPaths({ root: fileURLToPath(new URL('.', import.meta.url)) })],
});

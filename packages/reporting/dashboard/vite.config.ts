import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import tailwindcss from '@tailwindcss/vite';
import path from 'path';
import { fileURLToPath } from 'url';

const dashboardRoot = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    root: dashboardRoot,
    plugins: [react(), tailwindcss()],
    build: {
        // Served by the dashboard server from packages/reporting/dashboard-ui
        outDir: path.resolve(dashboardRoot, '../dashboard-ui'),
        emptyOutDir: true,
        rollupOptions: {
            output: {
                manualChunks: {
                    'react-vendor': ['react', 'react-dom'],
                    charts: ['recharts'],
                },
            },
        },
    },
    server: {
        port: 3000,
        proxy: {
            '/api': {
                target: 'http://localhost:3002',
                changeOrigin: true,
            },
            '/health': {
                target: 'http://localhost:3002',
                changeOrigin: true,
            },
        },
    },
});

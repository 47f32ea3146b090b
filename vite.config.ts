import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const API_ROUTES = ['/upload', '/upload_preview', '/save_audio', '/summarize', '/save_text', '/health'];
const API_TARGET = `http://127.0.0.1:${process.env.PORT || 8000}`;

export default defineConfig({
  plugins: [react()],
  build: {
    outDir: 'dist/web',
    emptyOutDir: true,
  },
  server: {
    port: 5173,
    proxy: Object.fromEntries(API_ROUTES.map(route => [route, API_TARGET])),
  },
});

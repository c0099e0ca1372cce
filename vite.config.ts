import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  build: {
    outDir: 'dist-client',
  },
  server: {
    proxy: {
      '/activities': 'http://localhost:4000',
      '/announcements': 'http://localhost:4000',
      '/auth': 'http://localhost:4000',
    },
  },
});

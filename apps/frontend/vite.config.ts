import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

// HOST lets the dev server bind elsewhere (e.g. 127.0.0.1 outside containers).
const host = process.env.HOST ?? '0.0.0.0';

export default defineConfig({
  plugins: [react()],
  server: {
    host,
  },
  test: {
    globals: true,
    environment: 'jsdom',
    setupFiles: './src/setupTests.ts',
  },
})

import { defineConfig } from 'vite'
import tsconfigPaths from 'vite-tsconfig-paths'
import path from 'node:path'

// Point Vite to the browser host directory where index.html lives
export default defineConfig({
  root: 'src/host/browser',
  appType: 'spa',
  plugins: [tsconfigPaths({ root: process.cwd() })],
  resolve: {
    alias: {
      '@core': path.resolve(process.cwd(), 'src/core'),
      '@host': path.resolve(process.cwd(), 'src/host'),
      '@utils': path.resolve(process.cwd(), 'src/utils'),
    },
  },
  build: {
    outDir: path.resolve(process.cwd(), 'dist'),
    emptyOutDir: true,
  },
  server: {
    open: true,
  },
})

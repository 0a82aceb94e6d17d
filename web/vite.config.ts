import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  build: {
    rollupOptions: {
      output: {
        manualChunks: {
          // Animation library - large but stable, cached well
          'vendor-ui': ['framer-motion'],
          'vendor-react': ['react', 'react-dom'],
        },
      },
    },
  },
})

import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// Vite config for static hosting under /mrcp-practice/
export default defineConfig({
  plugins: [react()],
  base: '/mrcp-practice/',
})

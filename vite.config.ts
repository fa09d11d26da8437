// vite.config.ts
import { defineConfig } from 'vite'
import { VitePWA } from 'vite-plugin-pwa'

export default defineConfig({
  plugins: [
    VitePWA({
      // auto register SW + update when new build is available
      registerType: 'autoUpdate',
      workbox: {
        // the game draws everything with Graphics: only code and markup to precache
        globPatterns: ['**/*.{js,css,html}']
      },
      manifest: {
        name: 'Ghost Maze',
        short_name: 'Ghost Maze',
        start_url: '.',
        scope: '.',
        display: 'standalone',
        background_color: '#000000',
        theme_color: '#000000'
      }
    })
  ],
  server: { port: 5173 },
  build: { sourcemap: true }
})

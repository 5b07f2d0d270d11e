import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      rollupTypes: false,
      outDir: 'dist'
    })
  ],
  build: {
    lib: {
      entry: 'src/index.ts',
      name: 'CoBridgeHal',
      fileName: 'index',
      formats: ['es']
    },
    rollupOptions: {
      external: ['@cobridge/kernel']
    }
  }
})

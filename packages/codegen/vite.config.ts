import { defineConfig } from 'vite'
import { resolve } from 'path'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      rollupTypes: false,
      outDir: 'dist',
      exclude: ['src/__tests__/**']
    })
  ],
  build: {
    lib: {
      entry: {
        index: resolve(__dirname, 'src/index.ts'),
        bin: resolve(__dirname, 'src/bin.ts')
      },
      formats: ['cjs']
    },
    rollupOptions: {
      // Workspace packages are bundled so bin/lsepe-gen.js runs from dist alone
      external: ['zod', 'fs', 'path']
    }
  }
})

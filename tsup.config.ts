// noinspection JSUnusedGlobalSymbols

import { defineConfig } from 'tsup';

// noinspection JSUnusedGlobalSymbols
export default defineConfig([
    {
        entry: { 'schema/index': 'src/schema/index.ts' },
        dts: true,
        format: ['esm', 'cjs'],
        sourcemap: true,
        outDir: 'dist',
        clean: false
    },
    {
        entry: { 'core/index': 'src/core/index.ts' },
        dts: true,
        format: ['esm', 'cjs'],
        sourcemap: true,
        outDir: 'dist',
        clean: false,
        noExternal: ['lodash-es'] // cjs consumers cannot require() it
    },
    {
        entry: { 'react/index': 'src/react/index.ts' },
        dts: true,
        format: ['esm', 'cjs'],
        sourcemap: true,
        outDir: 'dist',
        clean: false,
        external: ['react', 'react-dom'], // peer deps
        noExternal: ['lodash-es']
    }
]);

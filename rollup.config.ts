// See: https://rollupjs.org/introduction/

import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import nodeResolve from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'
import { existsSync } from 'fs'

// Entry points to bundle, each built to <entry>/dist/index.js
const entries = ['bootstrap-cloud']

const configs = entries
  .filter((entry) => existsSync(`${entry}/src/index.ts`))
  .map((entry) => ({
    input: `${entry}/src/index.ts`,
    output: {
      esModule: true,
      file: `${entry}/dist/index.js`,
      format: 'es' as const,
      banner: '#!/usr/bin/env node',
      sourcemap: true
    },
    plugins: [
      json(),
      typescript({
        tsconfig: './tsconfig.json',
        include: ['bootstrap-cloud/src/**/*.ts', 'packages/*/src/**/*.ts'],
        compilerOptions: {
          noEmit: false,
          outDir: undefined,
          declaration: false
        }
      }),
      nodeResolve({ preferBuiltins: true }),
      commonjs()
    ]
  }))

export default configs

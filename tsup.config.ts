import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// 运行时依赖保持 external，不打包
const shared: Options = {
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  sourcemap: true,
  external: [
    '@langchain/core',
    '@langchain/openai',
    'chalk',
    'commander',
    'dotenv',
    'eventemitter3',
    'uuid',
    'zod',
  ],
};

export default defineConfig([
  // 库入口：带类型声明
  {
    ...shared,
    entry: { index: 'src/index.ts' },
    dts: true,
  },
  // CLI 入口：只有它需要 shebang
  {
    ...shared,
    entry: { 'cli/index': 'src/cli/index.ts' },
    banner: { js: '#!/usr/bin/env node' },
  },
]);

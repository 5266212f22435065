import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli/index.ts'],
  dts: true, // 生成类型声明
  sourcemap: true,
  clean: true, // 构建前清理输出目录
  format: ['esm', 'cjs'],
  target: 'es2020',
  treeshake: true,
  minify: false,
  outDir: 'bundle',
  outExtension({ format }) {
    // index.mjs / index.cjs
    return { js: format === 'cjs' ? '.cjs' : '.mjs' };
  },
});

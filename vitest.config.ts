import ts from 'typescript';
import { defineConfig, type Plugin } from 'vitest/config';

// Transpile TypeScript with tsc rather than esbuild: esbuild renames shadowed
// function expressions (e.g. `const add = describeTool(..., function add() {})`
// becomes `function add2`), which changes `Function.name` that tools rely on.
function typescriptTranspile(): Plugin {
  return {
    name: 'typescript-transpile',
    enforce: 'pre',
    transform(code, id) {
      const file = id.split('?')[0] ?? id;
      if (!/\.m?ts$/.test(file) || file.endsWith('.d.ts')) {
        return null;
      }
      const output = ts.transpileModule(code, {
        fileName: file,
        compilerOptions: {
          target: ts.ScriptTarget.ES2022,
          module: ts.ModuleKind.ESNext,
          sourceMap: true,
          inlineSources: true,
          isolatedModules: true,
        },
      });
      return {
        code: output.outputText.replace(/\/\/# sourceMappingURL=.*$/m, ''),
        map: output.sourceMapText ?? null,
      };
    },
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [typescriptTranspile()],
  test: {
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    environment: 'node',
  },
});

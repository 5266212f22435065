import { describe, it, expect } from 'vitest';

import { compiler_options_schema, doc_for_key, key_docs, project_schema } from './index';

describe('project_schema', () => {
  it('accepts builds as a map keyed by build id', () => {
    const result = project_schema.safeParse({
      cljsbuild: { builds: { dev: { 'source-paths': ['src'], figwheel: true, compiler: { main: 'app.core' } } } },
      dependencies: [['org.clojure/clojure', '1.10.0']],
    });
    expect(result.success).toBe(true);
  });

  it('keeps the full path of nested build errors', () => {
    const result = project_schema.safeParse({
      cljsbuild: { builds: { dev: { 'source-paths': ['src'], compiler: { optimizations: 'fast' } } } },
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => [i.code, i.path])).toEqual([
      ['invalid_enum_value', ['cljsbuild', 'builds', 'dev', 'compiler', 'optimizations']],
    ]);
  });

  it('rejects builds that are neither a vector nor a map', () => {
    const result = project_schema.safeParse({ cljsbuild: { builds: 'dev' } });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]).toMatchObject({
      path: ['cljsbuild', 'builds'],
      message: 'builds must be a vector or a map of builds',
    });
  });

  it('requires at least one source path', () => {
    const result = project_schema.safeParse({ cljsbuild: { builds: [{ 'source-paths': [], compiler: {} }] } });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]).toMatchObject({
      path: ['cljsbuild', 'builds', 0, 'source-paths'],
      message: 'must contain at least one entry',
    });
  });
});

describe('compiler_options_schema', () => {
  it('allows a boolean source map without optimizations', () => {
    expect(compiler_options_schema.safeParse({ optimizations: 'none', 'source-map': true }).success).toBe(true);
    expect(compiler_options_schema.safeParse({ optimizations: 'simple', 'source-map': 'out/main.js.map' }).success).toBe(true);
  });
});

describe('option key coverage', () => {
  it('accepts every figwheel client callback and build-level warning handlers', () => {
    const result = project_schema.safeParse({
      cljsbuild: {
        builds: [
          {
            'source-paths': ['src'],
            compiler: {},
            'warning-handlers': ['app.build/warn'],
            figwheel: {
              'on-message': 'app.core/on-message',
              'on-compile-fail': 'app.core/on-fail',
              'on-compile-warning': 'app.core/on-warning',
              'eval-fn': 'app.core/eval',
            },
          },
        ],
        'crossover-jar': false,
      },
    });
    expect(result.success).toBe(true);
  });

  it('accepts compiler options from the full option table', () => {
    const result = compiler_options_schema.safeParse({
      'print-input-delimiter': false,
      'closure-extra-annotations': ['api'],
      'dump-core': false,
      'emit-constants': true,
      'ups-libs': ['lib.js'],
      'ups-externs': ['externs.js'],
      'ups-foreign-libs': [{ file: 'dep.js', provides: ['dep'] }],
      'closure-output-charset': 'utf-8',
      'external-config': { 'devtools/config': { 'features-to-install': 'all' } },
      warnings: { 'invoke-ctor': false, 'fn-var': true },
      'closure-warnings': { visiblity: 'off', 'unknown-defines': 'error' },
    });
    expect(result.success).toBe(true);
  });

  it('still rejects unknown warning switches', () => {
    expect(compiler_options_schema.safeParse({ 'closure-warnings': { 'no-such-check': 'off' } }).success).toBe(false);
  });

  it('documents the added keys', () => {
    expect(doc_for_key('source-map-inline')).toBe('Inline the source map into the output file as a data URL.');
    expect(doc_for_key('on-message')).toBeDefined();
  });
});

describe('key_docs', () => {
  it('documents known keys only', () => {
    expect(doc_for_key('output-to')).toMatch(/^Name of the JavaScript output file/);
    expect(doc_for_key('no-such-key')).toBeUndefined();
    expect(key_docs.has('optimizations')).toBe(true);
  });
});

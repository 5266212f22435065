import { z } from 'zod';

/**
 * ClojureScript 编译选项的结构校验。
 *
 * 所有 map 都用 .strict()：出现未登记的键即报 unrecognized_keys，
 * 这样拼错的键（如 :optimisations）不会被悄悄忽略。
 * 关键字 / 符号在校验前已被 to_plain 转成名字字符串（:advanced → "advanced"）。
 */

/** 字符串或符号（to_plain 后两者都是字符串） */
const StringOrSymbol = z.string();

const NonEmptyStrings = z.array(z.string()).min(1, 'must contain at least one entry');

const WarningValue = z.enum(['error', 'warning', 'off']);

/** 告警处理函数（符号 / 字符串）列表 */
export const WarningHandlers = z.array(z.unknown()).min(1, 'must contain at least one entry');

/**
 * 外部 JS 库
 */
const ForeignLib = z
  .object({
    /** 库文件的 URL */
    file: z.string(),
    /** 该库对外提供的合成命名空间 */
    provides: NonEmptyStrings,
    'file-min': z.string().optional(),
    requires: NonEmptyStrings.optional(),
    'module-type': z.enum(['commonjs', 'amd', 'es6']).optional(),
    preprocess: StringOrSymbol.optional(),
  })
  .strict();

/**
 * 代码拆分模块（:modules {:name {...}}）
 */
const Module = z
  .object({
    'output-to': z.string(),
    'output-dir': z.string().optional(),
    entries: NonEmptyStrings,
    'depends-on': NonEmptyStrings.optional(),
  })
  .strict();

/**
 * 编译器告警开关：true/false 整体开关，或逐项配置
 */
const Warnings = z.union([
  z.boolean(),
  z
    .object({
      'undeclared-ns-form': z.boolean().optional(),
      'protocol-deprecated': z.boolean().optional(),
      'undeclared-protocol-symbol': z.boolean().optional(),
      'fn-var': z.boolean().optional(),
      'invalid-arithmetic': z.boolean().optional(),
      'preamble-missing': z.boolean().optional(),
      'undeclared-var': z.boolean().optional(),
      'protocol-invalid-method': z.boolean().optional(),
      'variadic-max-arity': z.boolean().optional(),
      'multiple-variadic-overloads': z.boolean().optional(),
      'fn-deprecated': z.boolean().optional(),
      redef: z.boolean().optional(),
      'fn-arity': z.boolean().optional(),
      'invalid-protocol-symbol': z.boolean().optional(),
      dynamic: z.boolean().optional(),
      'undeclared-ns': z.boolean().optional(),
      'overload-arity': z.boolean().optional(),
      'extending-base-js-type': z.boolean().optional(),
      'single-segment-namespace': z.boolean().optional(),
      'protocol-duped-method': z.boolean().optional(),
      'protocol-multiple-impls': z.boolean().optional(),
      'invoke-ctor': z.boolean().optional(),
    })
    .strict(),
]);

/**
 * Google Closure 告警级别
 */
const ClosureWarnings = z
  .object({
    'access-controls': WarningValue.optional(),
    'ambiguous-function-decl': WarningValue.optional(),
    'debugger-statement-present': WarningValue.optional(),
    'check-regexp': WarningValue.optional(),
    'check-types': WarningValue.optional(),
    'check-useless-code': WarningValue.optional(),
    'check-variables': WarningValue.optional(),
    const: WarningValue.optional(),
    'constant-property': WarningValue.optional(),
    deprecated: WarningValue.optional(),
    'duplicate-message': WarningValue.optional(),
    'es5-strict': WarningValue.optional(),
    'externs-validation': WarningValue.optional(),
    'fileoverview-jsdoc': WarningValue.optional(),
    'global-this': WarningValue.optional(),
    'internet-explorer-checks': WarningValue.optional(),
    'invalid-casts': WarningValue.optional(),
    'missing-properties': WarningValue.optional(),
    'non-standard-jsdoc': WarningValue.optional(),
    'strict-module-dep-check': WarningValue.optional(),
    tweaks: WarningValue.optional(),
    'undefined-names': WarningValue.optional(),
    'undefined-variables': WarningValue.optional(),
    'unknown-defines': WarningValue.optional(),
    // 拼写沿用编译器本身的键名
    visiblity: WarningValue.optional(),
  })
  .strict();

const LanguageLevel = z.enum(['ecmascript3', 'ecmascript5', 'ecmascript5-strict']);

export const compiler_options_schema = z
  .object({
    'output-to': z.string().optional(),
    'output-dir': z.string().optional(),
    optimizations: z.enum(['none', 'whitespace', 'simple', 'advanced']).optional(),
    main: StringOrSymbol.optional(),
    'asset-path': z.string().optional(),
    'source-map': z.union([z.boolean(), z.string()]).optional(),
    preloads: NonEmptyStrings.optional(),
    verbose: z.boolean().optional(),
    'pretty-print': z.boolean().optional(),
    target: z.literal('nodejs').optional(),
    'foreign-libs': z.array(ForeignLib).optional(),
    externs: NonEmptyStrings.optional(),
    modules: z.record(z.string(), Module).optional(),
    'source-map-path': z.string().optional(),
    'source-map-timestamp': z.boolean().optional(),
    'cache-analysis': z.boolean().optional(),
    'recompile-dependents': z.boolean().optional(),
    'static-fns': z.boolean().optional(),
    'elide-asserts': z.boolean().optional(),
    'pseudo-names': z.boolean().optional(),
    'print-input-delimiter': z.boolean().optional(),
    'output-wrapper': z.boolean().optional(),
    libs: NonEmptyStrings.optional(),
    preamble: NonEmptyStrings.optional(),
    hashbang: z.boolean().optional(),
    'compiler-stats': z.boolean().optional(),
    'language-in': LanguageLevel.optional(),
    'language-out': LanguageLevel.optional(),
    'closure-defines': z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
    'closure-extra-annotations': NonEmptyStrings.optional(),
    'anon-fn-naming-policy': z.enum(['off', 'unmapped', 'mapped']).optional(),
    'optimize-constants': z.boolean().optional(),
    'parallel-build': z.boolean().optional(),
    devcards: z.boolean().optional(),
    'dump-core': z.boolean().optional(),
    'emit-constants': z.boolean().optional(),
    'warning-handlers': WarningHandlers.optional(),
    'source-map-inline': z.boolean().optional(),
    'ups-libs': NonEmptyStrings.optional(),
    'ups-externs': NonEmptyStrings.optional(),
    'ups-foreign-libs': z.array(ForeignLib).min(1, 'must contain at least one entry').optional(),
    'closure-output-charset': z.string().optional(),
    /** 第三方库的附加配置：库名 → 配置 map */
    'external-config': z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
    warnings: Warnings.optional(),
    'closure-warnings': ClosureWarnings.optional(),
  })
  .strict()
  .superRefine((opts, ctx) => {
    // 非 :none 优化级别下，source-map 必须是输出路径而不是布尔值
    if (
      opts.optimizations !== undefined &&
      opts.optimizations !== 'none' &&
      typeof opts['source-map'] === 'boolean' &&
      opts['source-map']
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `source-map must be a file path when optimizations is ${opts.optimizations}`,
        path: ['source-map'],
      });
    }
  });

export type CompilerOptionsType = z.infer<typeof compiler_options_schema>;

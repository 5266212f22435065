import { z } from 'zod';
import { compiler_options_schema, WarningHandlers } from './compiler-options.schema';

/**
 * project.clj 中与 ClojureScript 构建相关部分的结构校验。
 * 顶层 defproject 的其他键（:dependencies、:plugins ...）不在此校验范围，原样放行。
 */

const NonEmptyStrings = z.array(z.string()).min(1, 'must contain at least one entry');

/**
 * 单个构建的热加载（figwheel）选项：true 表示使用默认值
 */
const Figwheel = z.union([
  z.boolean(),
  z
    .object({
      'build-id': z.string().optional(),
      'websocket-host': z.string().optional(),
      'websocket-url': z.string().optional(),
      'on-jsload': z.string().optional(),
      'before-jsload': z.string().optional(),
      'on-cssload': z.string().optional(),
      'on-message': z.string().optional(),
      'on-compile-fail': z.string().optional(),
      'on-compile-warning': z.string().optional(),
      'reload-dependents': z.boolean().optional(),
      debug: z.boolean().optional(),
      autoload: z.boolean().optional(),
      'heads-up-display': z.boolean().optional(),
      'load-warninged-code': z.boolean().optional(),
      'retry-count': z.number().int().optional(),
      devcards: z.boolean().optional(),
      'eval-fn': z.string().optional(),
      'open-urls': NonEmptyStrings.optional(),
    })
    .strict(),
]);

/**
 * 单个构建（:cljsbuild {:builds [...]} 中的一项）
 */
export const build_schema = z
  .object({
    /** 构建 ID（字符串 / 符号 / 关键字均可，to_plain 后为字符串） */
    id: z.string().optional(),
    'source-paths': NonEmptyStrings,
    compiler: compiler_options_schema,
    figwheel: Figwheel.optional(),
    'notify-command': NonEmptyStrings.optional(),
    jar: z.boolean().optional(),
    incremental: z.boolean().optional(),
    assert: z.boolean().optional(),
    'warning-handlers': WarningHandlers.optional(),
  })
  .strict();

function is_record(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * :builds 可以是向量，也可以是以 build id 为键的 map。
 * 不用 z.union：union 内部的类型错误会被折叠成一条 invalid_union，丢失深层路径；
 * 这里手动分派，让每个问题都带着完整路径上报。
 */
const Builds = z.unknown().superRefine((builds, ctx) => {
  const entries: Array<[string | number, unknown]> | null = Array.isArray(builds)
    ? builds.map((b, i): [number, unknown] => [i, b])
    : is_record(builds)
      ? Object.entries(builds)
      : null;
  if (!entries) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'builds must be a vector or a map of builds' });
    return;
  }

  const seen = new Set<string>();
  for (const [key, build] of entries) {
    const result = build_schema.safeParse(build);
    if (!result.success) {
      for (const i of result.error.issues) {
        ctx.addIssue({ ...i, path: [key, ...i.path] });
      }
      continue;
    }
    // 向量形式中 build id 不可重复
    const id = result.data.id;
    if (typeof key !== 'number' || id === undefined) continue;
    if (seen.has(id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate build id '${id}'`, path: [key, 'id'] });
    }
    seen.add(id);
  }
});

/**
 * :cljsbuild 段
 */
const CljsBuild = z
  .object({
    builds: Builds,
    'repl-listen-port': z.number().int().optional(),
    'repl-launch-commands': z.record(z.string(), NonEmptyStrings).optional(),
    'test-commands': z.record(z.string(), NonEmptyStrings).optional(),
    crossovers: z.array(z.unknown()).min(1, 'must contain at least one entry').optional(),
    'crossover-path': z.array(z.unknown()).min(1, 'must contain at least one entry').optional(),
    'crossover-jar': z.boolean().optional(),
  })
  .strict();

export const project_schema = z
  .object({
    cljsbuild: CljsBuild.optional(),
    'source-paths': z.array(z.string()).optional(),
  })
  .passthrough();

export type BuildType = z.infer<typeof build_schema>;
export type ProjectType = z.infer<typeof project_schema>;

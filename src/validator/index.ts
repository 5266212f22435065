import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { resolve_options } from '../config';
import type { ResolveOptions } from '../config';
import { is_call_form, key_name } from '../cursor';
import type { Cursor } from '../cursor';
import { EdnParseError, PathContractError } from '../errors';
import { decode_node, parse_edn, set_own, to_plain } from '../reader';
import { call_form_options, column_number, initial_position, line_number, resolve_path } from '../resolver';
import { doc_for_key, issue, project_schema } from '../schema';
import type { CstNode, Path, SourcePoint, ValidateOptions, ValidateOutput, ValidationIssue } from '../types';
import { is_not_found } from '../utils/file.util';
import { pairs } from '../utils/iter.util';
import { to_pointer } from '../utils/segment.util';

/**
 * validate_text()
 * ----------------
 * 用途：解析 EDN 文本 → 转成普通数据 → zod 校验 → 把每个问题的路径映射回源码的 行/列。
 * 约定：
 *  - 不做 IO、不打印日志：诊断全部以 ValidationIssue 返回；
 *  - 定位失败只会让 location 缺省（并记一条 LOCATION_UNKNOWN 告警），绝不抛错。
 */
export function validate_text(text: string, options: ValidateOptions = {}): ValidateOutput {
  const t0 = Date.now();
  const file = options.file ?? '<text>';
  const schema = options.schema ?? project_schema;
  const resolve = resolve_options(options);
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const done = (): ValidateOutput => ({ ok: errors.length === 0, errors, warnings, time_ms: Date.now() - t0 });

  let root: CstNode;
  try {
    root = parse_edn(text);
  } catch (err) {
    if (!(err instanceof EdnParseError)) throw err;
    const { line, column } = err.position;
    errors.push(issue('PARSE_ERROR', '/', err.message, undefined, { file, line, column }));
    return done();
  }

  const start = initial_position(root, resolve);
  if (!start) {
    errors.push(issue('EMPTY_DOCUMENT', '/', 'document contains no map, vector or list'));
    return done();
  }

  let data: unknown;
  try {
    data = document_data(start, resolve);
  } catch (err) {
    // 结构能解析但字面量写错（如奇数个元素的 map、非法数字）
    if (!(err instanceof EdnParseError)) throw err;
    const { line, column } = err.position;
    errors.push(issue('PARSE_ERROR', '/', err.message, undefined, { file, line, column }));
    return done();
  }

  const result = schema.safeParse(data);
  if (result.success) return done();

  for (const zi of result.error.issues) {
    for (const reported of to_issues(zi)) {
      const location = locate(reported.path, start, file, resolve);
      if (!location) {
        warnings.push(issue('LOCATION_UNKNOWN', to_pointer(reported.path), 'could not map this path back to the source'));
      }
      errors.push(issue(reported.code, to_pointer(reported.path), reported.message, reported.hint, location));
    }
  }

  return done();
}

/** 读取文件后校验；文件不存在时给出 FILE_NOT_FOUND */
export async function validate_file(file: string, options: ValidateOptions = {}): Promise<ValidateOutput> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    if (!is_not_found(err)) throw err;
    return {
      ok: false,
      errors: [issue('FILE_NOT_FOUND', '/', `file not found: ${file}`)],
      warnings: [],
      time_ms: 0,
    };
  }
  return validate_text(text, { ...options, file });
}

/** file:line:column [CODE] /path : message；没有位置时省略前缀 */
export function format_issue(i: ValidationIssue): string {
  const where = i.location ? `${i.location.file}:${i.location.line}:${i.location.column} ` : '';
  return `${where}[${i.code}] ${i.path} : ${i.message}`;
}

interface ReportedIssue {
  code: string;
  path: Path;
  message: string;
  hint?: string;
}

/** zod issue → 待定位的问题；未知键逐个拆开，定位到各自的键 */
function to_issues(zi: ZodIssue): ReportedIssue[] {
  if (zi.code === z.ZodIssueCode.unrecognized_keys) {
    return zi.keys.map((key) => ({
      code: 'UNKNOWN_KEY',
      path: [...zi.path, key],
      message: `unknown key '${key}'`,
    }));
  }
  const last = zi.path[zi.path.length - 1];
  return [
    {
      code: 'SCHEMA_ERROR',
      path: zi.path,
      message: zi.message,
      hint: typeof last === 'string' ? doc_for_key(last) : undefined,
    },
  ];
}

/**
 * 路径 → 源码位置。空路径指向起点本身。
 * 路径与文档形状不符（对序列用了字符串段）也只视为“位置未知”。
 */
function locate(path: Path, start: Cursor, file: string, options: ResolveOptions): SourcePoint | undefined {
  let hit: Cursor | null;
  try {
    hit = path.length === 0 ? start : resolve_path(path, start, options);
  } catch (err) {
    if (!(err instanceof PathContractError)) throw err;
    return undefined;
  }
  if (!hit) return undefined;
  return { file, line: line_number(hit), column: column_number(hit) };
}

/**
 * 起点 → 普通数据：
 * call_form 取其关键字/值区组成对象（位置参数不参与校验），其余节点直接解码。
 */
function document_data(start: Cursor, options: ResolveOptions): unknown {
  if (!is_call_form(start.node, options.call_form)) return plain_of(start.node);

  const out: Record<string, unknown> = {};
  for (const [key, value] of pairs(call_form_options(start))) {
    const name = key_name(key.node);
    if (name !== null) set_own(out, name, plain_of(value.node));
  }
  return out;
}

function plain_of(node: CstNode): unknown {
  const value = decode_node(node);
  return value === undefined ? undefined : to_plain(value);
}

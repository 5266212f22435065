import { resolve_options } from '../config';
import type { ResolveOptions } from '../config';
import { direction, find_first_form, is_call_form, is_collection, next, next_value, root_cursor, to_root, topmost } from '../cursor';
import type { Cursor } from '../cursor';
import { EdnParseError } from '../errors';
import { node_text, parse_edn, read_edn } from '../reader';
import { NodeKind } from '../types';
import type { CstNode, EdnValue, Location, Path } from '../types';
import { read_text_if_exists } from '../utils/file.util';
import { count, filter_iter, take_while } from '../utils/iter.util';
import { is_key_position, resolve_hit } from './resolve-path';

/**
 * 行号 = 文档顺序中位于该节点之前的换行节点个数 + 1。
 * 只取决于换行 token 的数量，与列宽 / tab 展开无关。
 */
export function line_number(cursor: Cursor): number {
  const root = to_root(cursor) ?? topmost(cursor);
  const before = take_while(direction(next, root), (c) => c.node !== cursor.node);
  return count(filter_iter(before, (c) => c.node.kind === NodeKind.Newline)) + 1;
}

/** 列号：解析器为每个节点记录的起始列（从 1 开始） */
export function column_number(cursor: Cursor): number {
  return cursor.node.start.column;
}

/**
 * 取游标处的值：
 * - at 为 'key'（游标在 map / call_form 的键上）→ 取与之配对的值；没有配对值时退回键本身；
 * - at 为 'element' → 取节点自身。
 * 不传 at 时按游标所在位置判断。
 * 字面量写错（无法解码）时返回 undefined，不影响 Location 的其余字段。
 */
export function extract_value(
  cursor: Cursor,
  at?: Location['at'],
  options?: Partial<ResolveOptions>
): EdnValue | undefined {
  const on_key = at === undefined ? is_key_position(cursor, options) : at === 'key';
  const target = on_key ? next_value(cursor) ?? cursor : cursor;
  return decode_text(target.node);
}

function decode_text(node: CstNode): EdnValue | undefined {
  try {
    return read_edn(node_text(node));
  } catch (err) {
    if (err instanceof EdnParseError) return undefined;
    throw err;
  }
}

/**
 * 路径解析的起点：文档里有 call_form（如 defproject）就从它开始，
 * 否则取文档顺序中第一个集合；都没有返回 null。
 * #_ 丢弃的形式和 ^meta 的元数据不参与查找。
 */
export function initial_position(root: CstNode, options?: Partial<ResolveOptions>): Cursor | null {
  const { call_form } = resolve_options(options);
  const start = root_cursor(root);
  return find_first_form((n) => is_call_form(n, call_form), start) ?? find_first_form(is_collection, start);
}

/**
 * 在一段已加载的文本里解析路径。
 * 文本无法解析、没有起点、路径走不通都返回 null；非法路径段（程序错误）照常抛出。
 */
export function get_path_in_text(
  path: Path,
  text: string,
  file: string,
  options?: Partial<ResolveOptions>
): Location | null {
  let root: CstNode;
  try {
    root = parse_edn(text);
  } catch (err) {
    if (err instanceof EdnParseError) return null;
    throw err;
  }

  const start = initial_position(root, options);
  if (!start) return null;

  const hit = resolve_hit(path, start, options);
  if (!hit) return null;

  return {
    file,
    line: line_number(hit.cursor),
    column: column_number(hit.cursor),
    value: extract_value(hit.cursor, hit.at, options),
    at: hit.at,
    path,
    cursor: hit.cursor,
  };
}

/**
 * 给定一个 EDN 文件（或 project.clj），沿路径找到对应位置：
 *
 *   - line / column：命中项在文件中的位置
 *   - value：命中项的值（命中 map 的键时为该键对应的值）
 *   - at：命中的是键（'key'）还是元素本身（'element'）
 *   - path：调用方传入的路径
 *   - cursor：命中位置的游标
 *
 * 文件不存在时返回 null。
 */
export function get_path_in_file(path: Path, file: string, options?: Partial<ResolveOptions>): Location | null {
  const text = read_text_if_exists(file);
  if (text === null) return null;
  return get_path_in_text(path, text, file, options);
}

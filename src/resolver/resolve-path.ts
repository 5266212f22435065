import { resolve_options } from '../config';
import type { ResolveOptions } from '../config';
import { elements, is_call_form, is_key_match, is_keyword_token, next_value, wrapped_form } from '../cursor';
import type { Cursor } from '../cursor';
import { PathContractError } from '../errors';
import { NodeKind } from '../types';
import type { KeySegment, Path } from '../types';
import { drop, lazy, nth, pairs } from '../utils/iter.util';

/**
 * 节点作为“路径容器”的分类（带标签的变体，switch 时可做穷举检查）：
 * - map：键值对交替
 * - sequence：vector / list，按下标
 * - call_form：(defproject name "1.0" :k v ...)，位置参数 + 关键字/值对
 * - set：无序，不支持按路径进入
 * - wrapped：^meta / #tag / 'quote 等包装，对路径透明
 * - leaf：其余节点，无法继续深入
 */
export type Container =
  | { kind: 'map' }
  | { kind: 'sequence' }
  | { kind: 'call_form' }
  | { kind: 'set' }
  | { kind: 'wrapped'; inner: Cursor }
  | { kind: 'leaf' };

/** 命中结果：命中的是键（map / call_form）还是元素本身（sequence） */
export interface Hit {
  cursor: Cursor;
  at: 'key' | 'element';
}

export function classify_container(cursor: Cursor, options: ResolveOptions): Container {
  const node = cursor.node;
  switch (node.kind) {
    case NodeKind.Map:
      return { kind: 'map' };
    case NodeKind.List:
      return is_call_form(node, options.call_form) ? { kind: 'call_form' } : { kind: 'sequence' };
    case NodeKind.Vector:
      return { kind: 'sequence' };
    case NodeKind.Set:
      return { kind: 'set' };
    case NodeKind.Meta:
    case NodeKind.Tagged:
    case NodeKind.Prefix: {
      // 被包装的形式是最后一个有意义的子节点
      const inner = wrapped_form(cursor);
      return inner ? { kind: 'wrapped', inner } : { kind: 'leaf' };
    }
    case NodeKind.Root:
    case NodeKind.Symbol:
    case NodeKind.Keyword:
    case NodeKind.Literal:
    case NodeKind.Delimiter:
    case NodeKind.Whitespace:
    case NodeKind.Newline:
    case NodeKind.Comment:
    case NodeKind.Discard:
      return { kind: 'leaf' };
  }
}

/**
 * 在 cursor 指向的节点里查找一段路径：
 * map / call_form 返回键的位置，sequence 返回元素的位置；找不到返回 null。
 * 对 sequence 使用非整数段属于调用方错误，抛 PathContractError。
 */
export function find_key_in_node(segment: KeySegment, cursor: Cursor, options: ResolveOptions): Hit | null {
  const container = classify_container(cursor, options);
  switch (container.kind) {
    case 'map':
      return as_key(find_key_in_structure(segment, elements(cursor)));
    case 'sequence':
      return as_element(find_key_in_seq(segment, cursor));
    case 'call_form':
      return typeof segment === 'number'
        ? as_element(find_key_in_seq(segment, cursor))
        : as_key(find_key_in_structure(segment, call_form_options(cursor)));
    case 'set':
      // 集合无序，按路径进入集合一律视为“找不到”
      return null;
    case 'wrapped':
      return find_key_in_node(segment, container.inner, options);
    case 'leaf':
      return null;
  }
}

/**
 * 与 find_key_in_node 相同，但命中键时前进到与之配对的值，
 * 用于路径中除最后一段以外的各段。
 */
export function find_key_value_in_node(segment: KeySegment, cursor: Cursor, options: ResolveOptions): Cursor | null {
  const hit = find_key_in_node(segment, cursor, options);
  if (!hit) return null;
  return hit.at === 'key' ? next_value(hit.cursor) : hit.cursor;
}

/**
 * 沿路径逐段前进：中间各段取“值”，最后一段取“键”（或序列元素）的位置。
 * 任一段失败整体返回 null，不返回部分结果。
 */
export function resolve_path(path: Path, cursor: Cursor, options?: Partial<ResolveOptions>): Cursor | null {
  return resolve_hit(path, cursor, options)?.cursor ?? null;
}

export function resolve_hit(path: Path, cursor: Cursor, options?: Partial<ResolveOptions>): Hit | null {
  if (path.length === 0) throw new PathContractError('path must contain at least one segment');
  const opts = resolve_options(options);

  let current: Cursor | null = cursor;
  for (const segment of path.slice(0, -1)) {
    current = find_key_value_in_node(segment, current, opts);
    if (!current) return null;
  }
  return find_key_in_node(path[path.length - 1], current, opts);
}

/** 游标是否位于 map / call_form 的键位置 */
export function is_key_position(cursor: Cursor, options?: Partial<ResolveOptions>): boolean {
  const parent = cursor.parent;
  if (!parent) return false;
  const opts = resolve_options(options);
  const container = classify_container(parent, opts);

  const region = container.kind === 'map' ? elements(parent) : container.kind === 'call_form' ? call_form_options(parent) : null;
  if (!region) return false;
  for (const [key] of pairs(region)) {
    if (key.node === cursor.node) return true;
  }
  return false;
}

function find_key_in_structure(segment: KeySegment, region: Iterable<Cursor>): Cursor | null {
  for (const [key] of pairs(region)) {
    if (is_key_match(segment, key.node)) return key;
  }
  return null;
}

function find_key_in_seq(segment: KeySegment, cursor: Cursor): Cursor | null {
  if (typeof segment !== 'number' || !Number.isInteger(segment) || segment < 0) {
    throw new PathContractError(`sequence key must be a non-negative integer, got ${describe_segment(segment)}`);
  }
  return nth(elements(cursor), segment);
}

/** call_form 的关键字/值区：头部符号之后、第一个关键字开始的所有元素 */
export function call_form_options(cursor: Cursor): Iterable<Cursor> {
  const args = drop(1, elements(cursor));
  return lazy(function* () {
    let started = false;
    for (const item of args) {
      if (!started && !is_keyword_token(item.node)) continue;
      started = true;
      yield item;
    }
  });
}

function as_key(cursor: Cursor | null): Hit | null {
  return cursor ? { cursor, at: 'key' } : null;
}

function as_element(cursor: Cursor | null): Hit | null {
  return cursor ? { cursor, at: 'element' } : null;
}

function describe_segment(segment: KeySegment): string {
  if (typeof segment === 'string') return JSON.stringify(segment);
  if (typeof segment === 'number') return String(segment);
  return segment.type === 'keyword' ? `:${segment.name}` : segment.name;
}

import { EdnParseError } from '../errors';
import { decode_string } from '../reader';
import { NodeKind } from '../types';
import type { CstNode, KeySegment } from '../types';

/**
 * 节点分类谓词：只看节点的 kind，互斥且对所有 kind 都有定义。
 */

export const is_root = (node: CstNode) => node.kind === NodeKind.Root;
export const is_map = (node: CstNode) => node.kind === NodeKind.Map;
export const is_set = (node: CstNode) => node.kind === NodeKind.Set;
export const is_list = (node: CstNode) => node.kind === NodeKind.List;
export const is_vector = (node: CstNode) => node.kind === NodeKind.Vector;
export const is_symbolic_name = (node: CstNode) => node.kind === NodeKind.Symbol;
export const is_keyword_token = (node: CstNode) => node.kind === NodeKind.Keyword;
export const is_delimiter = (node: CstNode) => node.kind === NodeKind.Delimiter;

export function is_collection(node: CstNode): boolean {
  return is_map(node) || is_list(node) || is_vector(node);
}

/** 语义无关：空白、换行、注释，以及读取时被丢弃的 #_ 形式 */
export function is_insignificant(node: CstNode): boolean {
  switch (node.kind) {
    case NodeKind.Whitespace:
    case NodeKind.Newline:
    case NodeKind.Comment:
    case NodeKind.Discard:
      return true;
    default:
      return false;
  }
}

/** 叶子节点的原文；分支节点返回 null */
function leaf_text(node: CstNode): string | null {
  return 'text' in node ? node.text : null;
}

/** 关键字节点且名字（去掉冒号）等于 name */
export function is_keyword_match(name: string, node: CstNode): boolean {
  return is_keyword_token(node) && leaf_text(node) === `:${name}`;
}

/**
 * 作为 map 键时的文本名：
 * :output-to → "output-to"；"output-to" → "output-to"；output-to → "output-to"；42 → "42"。
 * 其余节点（集合等）没有文本名。
 */
export function key_name(node: CstNode): string | null {
  const text = leaf_text(node);
  if (text === null) return null;
  switch (node.kind) {
    case NodeKind.Keyword:
      return text.slice(1);
    case NodeKind.Symbol:
      return text;
    case NodeKind.Literal:
      return text.startsWith('"') ? string_key(text) : text;
    default:
      return null;
  }
}

/** 字符串键的内容；转义写错的键不与任何路径段匹配 */
function string_key(text: string): string | null {
  try {
    return decode_string(text);
  } catch (err) {
    if (err instanceof EdnParseError) return null;
    throw err;
  }
}

/**
 * 路径段与键节点是否匹配：
 * - EdnKeyword / EdnSymbol 段只匹配同类节点；
 * - 字符串段按文本名匹配任意关键字 / 符号 / 字符串键；
 * - 数字段匹配写法相同的数字键。
 */
export function is_key_match(segment: KeySegment, node: CstNode): boolean {
  if (typeof segment === 'number') {
    return node.kind === NodeKind.Literal && leaf_text(node) === String(segment);
  }
  if (typeof segment === 'string') return key_name(node) === segment;
  if (segment.type === 'keyword') return is_keyword_match(segment.name, node);
  return is_symbolic_name(node) && leaf_text(node) === segment.name;
}

/** 第一个有意义的子节点（跳过开定界符与空白 / 注释） */
function head_of(node: CstNode): CstNode | null {
  if (!('children' in node)) return null;
  for (const child of node.children) {
    if (is_insignificant(child) || is_delimiter(child)) continue;
    return child;
  }
  return null;
}

/** 调用形式：首个有意义的子节点是指定符号的列表，如 (defproject ...) */
export function is_call_form(node: CstNode, head: string): boolean {
  if (!is_list(node)) return false;
  const first = head_of(node);
  return first !== null && is_symbolic_name(first) && leaf_text(first) === head;
}

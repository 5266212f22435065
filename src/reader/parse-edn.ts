import { EdnParseError } from '../errors';
import { NodeKind } from '../types';
import type { BranchKind, BranchNode, CstNode, LeafKind, LeafNode, Position } from '../types';

/**
 * EDN → 无损 CST
 * ----------------
 * 每个字符都落在且只落在一个叶子节点里：按文档顺序拼接所有叶子的 text 即得原文。
 * 空白（空格 / tab / 逗号）、换行（\n 或 \r\n）、注释都是独立的叶子；
 * 集合的定界符也是叶子（Delimiter），作为集合的首、尾子节点。
 */

interface Scanner {
  readonly text: string;
  offset: number;
  line: number;
  column: number;
}

const CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const PREFIX_MARKERS = ['~@', "'", '`', '~', '@'];

export function parse_edn(text: string): BranchNode {
  const s: Scanner = { text, offset: 0, line: 1, column: 1 };
  const start = here(s);
  const children: CstNode[] = [];

  while (!at_end(s)) {
    const trivia = read_trivia(s);
    if (trivia) {
      children.push(trivia);
      continue;
    }
    if (is_closer(peek(s))) {
      throw new EdnParseError(`unmatched '${peek(s)}'`, here(s));
    }
    children.push(read_form(s));
  }

  return { kind: NodeKind.Root, start, children };
}

/** 子树的原文：按文档顺序拼接叶子文本 */
export function node_text(node: CstNode): string {
  if ('text' in node) return node.text;
  let out = '';
  for (const child of node.children) out += node_text(child);
  return out;
}

// —— 扫描器基础操作

function here(s: Scanner): Position {
  return { offset: s.offset, line: s.line, column: s.column };
}

function at_end(s: Scanner, ahead = 0): boolean {
  return s.offset + ahead >= s.text.length;
}

function peek(s: Scanner, ahead = 0): string {
  return s.text.charAt(s.offset + ahead);
}

function advance(s: Scanner, count: number): void {
  for (let i = 0; i < count; i += 1) {
    const ch = s.text.charAt(s.offset);
    s.offset += 1;
    if (ch === '\n') {
      s.line += 1;
      s.column = 1;
    } else {
      s.column += 1;
    }
  }
}

function leaf(s: Scanner, kind: LeafKind, length: number): LeafNode {
  const start = here(s);
  const text = s.text.slice(s.offset, s.offset + length);
  advance(s, length);
  return { kind, start, text };
}

function is_whitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === ',' || ch === '\f' || ch === '\r';
}

function is_closer(ch: string): boolean {
  return ch === ')' || ch === ']' || ch === '}';
}

/** token（符号 / 关键字 / 数字）在这些字符处结束 */
function is_terminator(ch: string): boolean {
  return (
    is_whitespace(ch) ||
    ch === '\n' ||
    ch === '(' || ch === ')' ||
    ch === '[' || ch === ']' ||
    ch === '{' || ch === '}' ||
    ch === '"' || ch === ';'
  );
}

function token_length(s: Scanner, from: number): number {
  let i = s.offset + from;
  while (i < s.text.length && !is_terminator(s.text.charAt(i))) i += 1;
  return i - s.offset;
}

// —— 语义无关的叶子：空白 / 换行 / 注释

function read_trivia(s: Scanner): LeafNode | null {
  const ch = peek(s);
  if (ch === '\n') return leaf(s, NodeKind.Newline, 1);
  if (ch === '\r' && peek(s, 1) === '\n') return leaf(s, NodeKind.Newline, 2);

  if (is_whitespace(ch)) {
    let i = s.offset;
    while (i < s.text.length) {
      const c = s.text.charAt(i);
      if (!is_whitespace(c) || (c === '\r' && s.text.charAt(i + 1) === '\n')) break;
      i += 1;
    }
    return leaf(s, NodeKind.Whitespace, i - s.offset);
  }

  if (ch === ';') {
    let i = s.offset;
    while (i < s.text.length && s.text.charAt(i) !== '\n' && s.text.charAt(i) !== '\r') i += 1;
    return leaf(s, NodeKind.Comment, i - s.offset);
  }

  return null;
}

// —— 有意义的形式

function read_form(s: Scanner): CstNode {
  const ch = peek(s);

  const closer = CLOSERS[ch];
  if (closer) {
    const kind = ch === '(' ? NodeKind.List : ch === '[' ? NodeKind.Vector : NodeKind.Map;
    return read_collection(s, kind, 1, closer);
  }

  if (ch === '"') return leaf(s, NodeKind.Literal, string_length(s, 1));
  if (ch === '\\') {
    if (at_end(s, 1)) throw new EdnParseError('character literal without a character', here(s));
    return leaf(s, NodeKind.Literal, token_length(s, 2));
  }
  if (ch === '#') return read_dispatch(s);
  if (ch === '^') return read_wrapper(s, NodeKind.Meta, 1, 2);

  const marker = PREFIX_MARKERS.find((m) => s.text.startsWith(m, s.offset));
  if (marker) return read_wrapper(s, NodeKind.Prefix, marker.length, 1);

  const length = token_length(s, 0);
  const token = s.text.slice(s.offset, s.offset + length);
  if (ch === ':') return leaf(s, NodeKind.Keyword, length);
  if (/^[+-]?\d/.test(token) || token === 'nil' || token === 'true' || token === 'false') {
    return leaf(s, NodeKind.Literal, length);
  }
  return leaf(s, NodeKind.Symbol, length);
}

function read_dispatch(s: Scanner): CstNode {
  const next = peek(s, 1);
  if (next === '{') return read_collection(s, NodeKind.Set, 2, '}');
  if (next === '_') return read_wrapper(s, NodeKind.Discard, 2, 1);
  if (next === '"') return leaf(s, NodeKind.Literal, string_length(s, 2));
  if (next === '#') return leaf(s, NodeKind.Literal, token_length(s, 2));

  // #tag form：'#' 与标签符号之间不允许空白
  const tag_length = token_length(s, 1) - 1;
  if (tag_length <= 0 || !/^[A-Za-z]/.test(next)) {
    throw new EdnParseError(`unsupported dispatch '#${next}'`, here(s));
  }
  const start = here(s);
  const children: CstNode[] = [leaf(s, NodeKind.Delimiter, 1), leaf(s, NodeKind.Symbol, tag_length)];
  children.push(...read_operands(s, '#', 1));
  return { kind: NodeKind.Tagged, start, children };
}

function read_collection(s: Scanner, kind: BranchKind, open_length: number, closer: string): BranchNode {
  const start = here(s);
  const children: CstNode[] = [leaf(s, NodeKind.Delimiter, open_length)];

  for (;;) {
    if (at_end(s)) throw new EdnParseError(`unterminated ${kind}, expected '${closer}'`, start);
    const trivia = read_trivia(s);
    if (trivia) {
      children.push(trivia);
      continue;
    }
    const ch = peek(s);
    if (ch === closer) {
      children.push(leaf(s, NodeKind.Delimiter, 1));
      return { kind, start, children };
    }
    if (is_closer(ch)) throw new EdnParseError(`unexpected '${ch}', expected '${closer}'`, here(s));
    children.push(read_form(s));
  }
}

/** 读取 marker 之后的 count 个形式（连同中间的空白 / 注释） */
function read_wrapper(s: Scanner, kind: BranchKind, marker_length: number, count: number): BranchNode {
  const start = here(s);
  const marker = leaf(s, NodeKind.Delimiter, marker_length);
  return { kind, start, children: [marker, ...read_operands(s, marker.text, count)] };
}

function read_operands(s: Scanner, marker: string, count: number): CstNode[] {
  const out: CstNode[] = [];
  let seen = 0;
  while (seen < count) {
    if (at_end(s) || is_closer(peek(s))) {
      throw new EdnParseError(`missing form after '${marker}'`, here(s));
    }
    const trivia = read_trivia(s);
    if (trivia) {
      out.push(trivia);
      continue;
    }
    out.push(read_form(s));
    seen += 1;
  }
  return out;
}

/** 字符串 / 正则字面量的总长度（含引号）；from 为正文相对当前位置的起点 */
function string_length(s: Scanner, from: number): number {
  let i = s.offset + from;
  while (i < s.text.length) {
    const ch = s.text.charAt(i);
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"') return i + 1 - s.offset;
    i += 1;
  }
  throw new EdnParseError('unterminated string', here(s));
}

import { EdnParseError } from '../errors';
import { NodeKind } from '../types';
import type { BranchNode, CstNode, EdnValue, LeafNode } from '../types';
import { parse_edn } from './parse-edn';

const STRING_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  '"': '"',
  '\\': '\\',
};

const NAMED_CHARS: Record<string, string> = {
  newline: '\n',
  space: ' ',
  tab: '\t',
  return: '\r',
  backspace: '\b',
  formfeed: '\f',
};

const PREFIX_SYMBOLS: Record<string, string> = {
  "'": 'quote',
  '`': 'syntax-quote',
  '~': 'unquote',
  '~@': 'unquote-splicing',
  '@': 'deref',
};

/**
 * 把一段 EDN 文本读成值：取第一个有意义的形式。
 * 文本里没有任何形式（只有空白 / 注释）时返回 undefined；格式错误抛 EdnParseError。
 */
export function read_edn(text: string): EdnValue | undefined {
  return decode_node(parse_edn(text));
}

/**
 * 直接从 CST 子树解码。
 * 空白 / 换行 / 注释 / #_ 丢弃形式 / 定界符本身不代表任何值，返回 undefined。
 */
export function decode_node(node: CstNode): EdnValue | undefined {
  switch (node.kind) {
    case NodeKind.Whitespace:
    case NodeKind.Newline:
    case NodeKind.Comment:
    case NodeKind.Discard:
    case NodeKind.Delimiter:
      return undefined;
    case NodeKind.Keyword:
      return decode_keyword(node);
    case NodeKind.Symbol:
      return { type: 'symbol', name: node.text };
    case NodeKind.Literal:
      return decode_literal(node);
    case NodeKind.Root:
      return first_value(node.children);
    case NodeKind.List:
      return { type: 'list', items: values_of(node) };
    case NodeKind.Vector:
      return { type: 'vector', items: values_of(node) };
    case NodeKind.Set:
      return { type: 'set', items: values_of(node) };
    case NodeKind.Map:
      return decode_map(node);
    case NodeKind.Tagged:
      return decode_tagged(node);
    case NodeKind.Meta:
      // 元数据不属于值本身：只取被修饰的形式
      return values_of(node)[1];
    case NodeKind.Prefix:
      return decode_prefix(node);
  }
}

/** 字符串字面量（含两侧引号）→ JS 字符串 */
export function decode_string(literal: string): string {
  let out = '';
  for (let i = 1; i < literal.length - 1; i += 1) {
    const ch = literal.charAt(i);
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const esc = literal.charAt(i + 1);
    if (esc === 'u') {
      const hex = literal.slice(i + 2, i + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw malformed(`bad unicode escape '\\u${hex}'`);
      out += String.fromCharCode(parseInt(hex, 16));
      i += 5;
      continue;
    }
    const mapped = STRING_ESCAPES[esc];
    if (mapped === undefined) throw malformed(`unsupported escape '\\${esc}'`);
    out += mapped;
    i += 1;
  }
  return out;
}

function values_of(node: BranchNode): EdnValue[] {
  const out: EdnValue[] = [];
  for (const child of node.children) {
    const value = decode_node(child);
    if (value !== undefined) out.push(value);
  }
  return out;
}

function first_value(children: readonly CstNode[]): EdnValue | undefined {
  for (const child of children) {
    const value = decode_node(child);
    if (value !== undefined) return value;
  }
  return undefined;
}

function decode_keyword(node: LeafNode): EdnValue {
  const name = node.text.slice(1);
  if (!name) throw malformed(`invalid keyword '${node.text}'`, node);
  return { type: 'keyword', name };
}

function decode_map(node: BranchNode): EdnValue {
  const items = values_of(node);
  if (items.length % 2 !== 0) {
    throw malformed('map literal must contain an even number of forms', node);
  }
  const entries: Array<[EdnValue, EdnValue]> = [];
  for (let i = 0; i < items.length; i += 2) entries.push([items[i], items[i + 1]]);
  return { type: 'map', entries };
}

function decode_tagged(node: BranchNode): EdnValue {
  // children: '#' 标签符号 ...空白 形式
  const [, tag, ...rest] = node.children;
  const value = first_value(rest);
  if (!tag || !('text' in tag) || value === undefined) throw malformed('incomplete tagged literal', node);
  return { type: 'tagged', tag: tag.text, value };
}

function decode_prefix(node: BranchNode): EdnValue {
  const [marker, ...rest] = node.children;
  const value = first_value(rest);
  const name = marker && 'text' in marker ? PREFIX_SYMBOLS[marker.text] : undefined;
  if (!name || value === undefined) throw malformed('incomplete reader macro', node);
  return { type: 'list', items: [{ type: 'symbol', name }, value] };
}

function decode_literal(node: LeafNode): EdnValue {
  const text = node.text;
  if (text === 'nil') return null;
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text.startsWith('"')) return decode_string(text);
  if (text.startsWith('#"')) return { type: 'tagged', tag: 'regex', value: text.slice(2, -1) };
  if (text.startsWith('\\')) return decode_char(node);
  if (text === '##Inf') return Infinity;
  if (text === '##-Inf') return -Infinity;
  if (text === '##NaN') return NaN;
  return decode_number(node);
}

function decode_char(node: LeafNode): EdnValue {
  const body = node.text.slice(1);
  if (body.length === 1) return { type: 'char', value: body };
  const named = NAMED_CHARS[body];
  if (named !== undefined) return { type: 'char', value: named };
  if (/^u[0-9a-fA-F]{4}$/.test(body)) {
    return { type: 'char', value: String.fromCharCode(parseInt(body.slice(1), 16)) };
  }
  throw malformed(`invalid character literal '${node.text}'`, node);
}

function decode_number(node: LeafNode): number {
  const text = node.text;
  const integer = /^[+-]?(\d+)N?$/.exec(text);
  if (integer) {
    // 除 0 以外的整数不能以 0 开头（010 不是合法的 EDN 数字）
    if (integer[1].length > 1 && integer[1].startsWith('0')) throw malformed(`invalid number '${text}'`, node);
    return safe_integer(Number(text.replace(/N$/, '')), node);
  }
  if (/^[+-]?0[xX][0-9a-fA-F]+$/.test(text)) {
    const negative = text.startsWith('-');
    const value = safe_integer(parseInt(text.replace(/^[+-]?0[xX]/, ''), 16), node);
    return negative ? -value : value;
  }
  if (/^[+-]?\d+(\.\d*)?([eE][+-]?\d+)?M?$/.test(text)) return Number(text.replace(/M$/, ''));
  const ratio = /^([+-]?\d+)\/(\d+)$/.exec(text);
  if (ratio && Number(ratio[2]) !== 0) return Number(ratio[1]) / Number(ratio[2]);
  throw malformed(`invalid number '${text}'`, node);
}

/** 超出 2^53 的整数无法用 number 精确表示，不做有损解码 */
function safe_integer(value: number, node: LeafNode): number {
  if (!Number.isSafeInteger(value)) throw malformed(`integer out of range '${node.text}'`, node);
  return value;
}

function malformed(message: string, node?: CstNode): EdnParseError {
  return new EdnParseError(message, node?.start ?? { offset: 0, line: 1, column: 1 });
}

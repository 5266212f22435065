/**
 * parse_edn() 的单元测试
 *
 * - 无损：拼接所有叶子文本还原原文
 * - 节点划分与位置（行 / 列）
 * - 错误输入抛 EdnParseError 并带位置
 */
import { describe, it, expect } from 'vitest';

import { EdnParseError } from '../errors';
import { NodeKind } from '../types';
import type { BranchNode, CstNode } from '../types';
import { node_text, parse_edn } from './parse-edn';

function branch(node: CstNode | undefined): BranchNode {
  if (!node || !('children' in node)) throw new Error('expected a branch node');
  return node;
}

const kinds = (node: BranchNode) => node.children.map((c) => c.kind);

describe('parse_edn', () => {
  it('reproduces the source byte-for-byte', () => {
    const source = [
      ';; build configuration',
      '{:output-to "out/main.js" , :optimizations :none',
      '\t:preloads [foo.dev] ; dev only',
      ' :defines {"goog.DEBUG" false}\r',
      ' :tags #{:a :b} :when #inst "2020-01-01" :re #"a\\"b+"',
      ' :chars [\\a \\newline \\u0041] :meta ^:private sym',
      " :quoted 'x :skip #_ [1 2] :inf ##Inf :ratio 1/2}",
      '',
    ].join('\n');

    expect(node_text(parse_edn(source))).toBe(source);
  });

  it('splits a map into delimiters, tokens and whitespace', () => {
    const root = parse_edn('{:a 1 :b 2}');
    expect(root.kind).toBe(NodeKind.Root);
    const map = branch(root.children[0]);
    expect(map.kind).toBe(NodeKind.Map);
    expect(kinds(map)).toEqual([
      NodeKind.Delimiter,
      NodeKind.Keyword,
      NodeKind.Whitespace,
      NodeKind.Literal,
      NodeKind.Whitespace,
      NodeKind.Keyword,
      NodeKind.Whitespace,
      NodeKind.Literal,
      NodeKind.Delimiter,
    ]);
    expect(map.children[5]).toEqual({
      kind: NodeKind.Keyword,
      start: { offset: 6, line: 1, column: 7 },
      text: ':b',
    });
  });

  it('treats \\r\\n as a single newline node and tracks lines', () => {
    const root = parse_edn('a\r\nb');
    expect(root.children.map((c) => node_text(c))).toEqual(['a', '\r\n', 'b']);
    expect(root.children[1].kind).toBe(NodeKind.Newline);
    expect(root.children[2].start).toEqual({ offset: 3, line: 2, column: 1 });
  });

  it('keeps comments and commas as separate insignificant leaves', () => {
    const root = parse_edn('[1, 2] ; done');
    const vec = branch(root.children[0]);
    expect(vec.children.map((c) => node_text(c))).toEqual(['[', '1', ', ', '2', ']']);
    expect(vec.children[2].kind).toBe(NodeKind.Whitespace);
    expect(root.children[2]).toMatchObject({ kind: NodeKind.Comment, text: '; done' });
  });

  it('classifies symbols, keywords and literals', () => {
    const root = parse_edn('(foo.core/bar :k "s" 42 -1.5 nil true \\c)');
    const list = branch(root.children[0]);
    const significant = list.children.filter((c) => c.kind !== NodeKind.Whitespace);
    expect(significant.map((c) => c.kind)).toEqual([
      NodeKind.Delimiter,
      NodeKind.Symbol,
      NodeKind.Keyword,
      NodeKind.Literal,
      NodeKind.Literal,
      NodeKind.Literal,
      NodeKind.Literal,
      NodeKind.Literal,
      NodeKind.Literal,
      NodeKind.Delimiter,
    ]);
  });

  it('wraps reader forms: set, discard, tagged literal, metadata, quote', () => {
    const root = parse_edn("[#{1} #_2 #inst \"2020\" ^:m x 'y]");
    const vec = branch(root.children[0]);
    const forms = vec.children.filter((c) => c.kind !== NodeKind.Whitespace);
    expect(forms.map((c) => c.kind)).toEqual([
      NodeKind.Delimiter,
      NodeKind.Set,
      NodeKind.Discard,
      NodeKind.Tagged,
      NodeKind.Meta,
      NodeKind.Prefix,
      NodeKind.Delimiter,
    ]);
    expect(branch(forms[3]).children.map((c) => node_text(c))).toEqual(['#', 'inst', ' ', '"2020"']);
    expect(node_text(forms[1])).toBe('#{1}');
  });

  it('keeps a newline inside a string literal within the literal', () => {
    const root = parse_edn('["a\nb" c]');
    const vec = branch(root.children[0]);
    expect(vec.children.map((c) => c.kind)).not.toContain(NodeKind.Newline);
    expect(vec.children[3].start).toEqual({ offset: 7, line: 2, column: 4 });
  });

  it('rejects an unterminated collection at its opening position', () => {
    expect(() => parse_edn('{:a 1')).toThrow(EdnParseError);
    expect(() => parse_edn('{:a 1')).toThrow("line 1:1: unterminated map, expected '}'");
  });

  it('rejects mismatched and unmatched closing delimiters', () => {
    expect(() => parse_edn('[1 2)')).toThrow("line 1:5: unexpected ')', expected ']'");
    expect(() => parse_edn('1 2]')).toThrow("line 1:4: unmatched ']'");
  });

  it('rejects unterminated strings and dangling reader macros', () => {
    expect(() => parse_edn('"abc')).toThrow('line 1:1: unterminated string');
    expect(() => parse_edn("'")).toThrow("line 1:2: missing form after '''");
    expect(() => parse_edn('#(inc %)')).toThrow("line 1:1: unsupported dispatch '#('");
  });

  it('carries the position on the error object', () => {
    try {
      parse_edn('{\n  :a [1 2}');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EdnParseError);
      if (err instanceof EdnParseError) {
        expect(err.position).toEqual({ offset: 11, line: 2, column: 10 });
      }
    }
  });
});

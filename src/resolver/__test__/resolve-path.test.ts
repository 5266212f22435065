import { describe, it, expect } from 'vitest';

import { root_cursor } from '../../cursor';
import { PathContractError } from '../../errors';
import { node_text, parse_edn } from '../../reader';
import type { Path } from '../../types';
import { kw, sym } from '../../utils/segment.util';
import { get_path_in_text, initial_position } from '../location';
import { resolve_hit, resolve_path } from '../resolve-path';

const FILE = 'test.edn';

function locate(path: Path, text: string, call_form?: string) {
  return get_path_in_text(path, text, FILE, call_form ? { call_form } : undefined);
}

const PROJECT = [
  '(defproject foo "1.0"',
  '  :description "demo"',
  '  :deps [[a "1"]])',
].join('\n');

describe('resolve_path: maps and sequences', () => {
  it('finds a map key and reports the paired value', () => {
    const loc = locate([kw('b')], '{:a 1 :b 2}');
    expect(loc).toMatchObject({ file: FILE, line: 1, column: 7, value: 2, at: 'key' });
  });

  it('follows a nested path through maps into a vector', () => {
    const loc = locate([kw('a'), kw('b'), 2], '{:a {:b [10 20 30]}}');
    expect(loc).toMatchObject({ line: 1, column: 16, value: 30, at: 'element' });
  });

  it('returns null for a missing key or an out-of-range index', () => {
    expect(locate([kw('z')], '{:a 1}')).toBeNull();
    expect(locate([5], '[1 2 3]')).toBeNull();
    expect(locate([kw('a'), kw('b')], '{:a 1}')).toBeNull();
  });

  it('treats a trailing unpaired map key as not found', () => {
    expect(locate([kw('b')], '{:a 1 :b}')).toBeNull();
  });

  it('matches string and symbol keys by name', () => {
    const text = '{"name" 1 sym 2}';
    expect(locate(['name'], text)?.value).toBe(1);
    expect(locate([sym('sym')], text)?.value).toBe(2);
    expect(locate(['sym'], text)?.value).toBe(2);
    expect(locate([kw('name')], text)).toBeNull();
  });

  it('skips comments, blank lines and discarded forms', () => {
    const text = [';; header', '', '{:a 1 ; one', ' ;; comment', ' #_:b #_2', ' :b {:c 3}}'].join('\n');
    expect(locate([kw('b'), kw('c')], text)).toMatchObject({ line: 6, column: 6, value: 3 });
  });

  it('looks through metadata and tagged literals', () => {
    expect(locate([kw('a'), kw('b')], '{:a ^{:doc "x"} {:b 2}}')?.value).toBe(2);
    expect(locate([kw('t'), kw('x')], '{:t #my/tag {:x 1}}')?.value).toBe(1);
  });

  it('never resolves into a set', () => {
    const text = '{:tags #{:a :b}}';
    expect(locate([kw('tags')], text)?.value).toEqual({ type: 'set', items: [kw('a'), kw('b')] });
    expect(locate([kw('tags'), kw('a')], text)).toBeNull();
    expect(locate([kw('tags'), 0], text)).toBeNull();
  });

  it('is deterministic', () => {
    const text = '{:a {:b [10 20 30]}}';
    const a = locate([kw('a'), kw('b')], text);
    const b = locate([kw('a'), kw('b')], text);
    expect(a?.line).toBe(b?.line);
    expect(a?.column).toBe(b?.column);
    expect(a?.value).toEqual(b?.value);
  });
});

describe('resolve_path: call forms', () => {
  it('resolves keywords in the option region after the positional arguments', () => {
    const loc = locate([kw('deps')], PROJECT);
    expect(loc).toMatchObject({ line: 3, column: 3, at: 'key' });
    expect(loc?.value).toEqual({ type: 'vector', items: [{ type: 'vector', items: [sym('a'), '1'] }] });
  });

  it('continues from an option value into nested data', () => {
    expect(locate([kw('deps'), 0, 1], PROJECT)).toMatchObject({ line: 3, column: 13, value: '1', at: 'element' });
  });

  it('indexes the whole form, head symbol included, for integer segments', () => {
    expect(locate([0], PROJECT)).toMatchObject({ value: sym('defproject'), at: 'element' });
    expect(locate([2], PROJECT)).toMatchObject({ line: 1, column: 17, value: '1.0' });
  });

  it('does not treat positional arguments as keys', () => {
    expect(locate(['foo'], PROJECT)).toBeNull();
  });

  it('uses the configured head symbol', () => {
    const text = '(defthing x :k 1)';
    expect(locate([kw('k')], text, 'defthing')).toMatchObject({ column: 13, value: 1 });
    // 头部不匹配时只是普通列表，关键字段属于非法的序列下标
    expect(() => locate([kw('k')], text)).toThrow(PathContractError);
  });

  it('prefers the call form over an earlier collection as the starting point', () => {
    const root = parse_edn('[:ignored]\n(defproject foo "1.0" :k 1)');
    const start = initial_position(root);
    expect(start && node_text(start.node).startsWith('(defproject')).toBe(true);
  });
});

describe('resolve_path: starting position', () => {
  it('skips a discarded collection', () => {
    expect(locate([kw('b')], '#_{:a 1}\n{:b 2}')).toMatchObject({ line: 2, column: 2, value: 2 });
    expect(locate([kw('a')], '#_{:a 1}\n{:b 2}')).toBeNull();
  });

  it('skips a discarded call form', () => {
    const text = '#_(defproject old "0" :k 1)\n(defproject new "1" :k 2)';
    expect(locate([kw('k')], text)).toMatchObject({ line: 2, column: 21, value: 2 });
  });

  it('starts at the target of a metadata form, not at the metadata map', () => {
    const text = '^{:doc "x"} {:a 1}';
    expect(locate([kw('a')], text)).toMatchObject({ line: 1, column: 14, value: 1 });
    expect(locate([kw('doc')], text)).toBeNull();
  });
});

describe('resolve_path: contract violations', () => {
  it('rejects non-integer segments against sequences', () => {
    expect(() => locate([kw('x')], '[1 2 3]')).toThrow(PathContractError);
    expect(() => locate([-1], '[1 2 3]')).toThrow('sequence key must be a non-negative integer, got -1');
    expect(() => locate([1.5], '[1 2 3]')).toThrow(PathContractError);
    expect(() => locate(['x'], '[1 2 3]')).toThrow('sequence key must be a non-negative integer, got "x"');
  });

  it('rejects an empty path', () => {
    const start = root_cursor(parse_edn('{:a 1}'));
    expect(() => resolve_path([], start)).toThrow(PathContractError);
  });
});

describe('resolve_hit', () => {
  it('reports whether the last segment hit a key or an element', () => {
    const root = parse_edn('{:a [1 2]}');
    const start = initial_position(root);
    expect(start).not.toBeNull();
    if (!start) return;

    const key = resolve_hit([kw('a')], start);
    expect(key?.at).toBe('key');
    expect(key && node_text(key.cursor.node)).toBe(':a');

    const element = resolve_hit([kw('a'), 1], start);
    expect(element?.at).toBe('element');
    expect(element && node_text(element.cursor.node)).toBe('2');
  });
});

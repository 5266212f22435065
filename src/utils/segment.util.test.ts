import { describe, it, expect } from 'vitest';

import { kw, parse_segment, segment_name, sym, to_pointer } from './segment.util';

describe('parse_segment', () => {
  it('reads keywords, indices and plain names', () => {
    expect(parse_segment(':builds')).toEqual(kw('builds'));
    expect(parse_segment('12')).toBe(12);
    expect(parse_segment('output-to')).toBe('output-to');
  });

  it('keeps a lone colon and signed numbers as names', () => {
    expect(parse_segment(':')).toBe(':');
    expect(parse_segment('-1')).toBe('-1');
  });
});

describe('to_pointer', () => {
  it('joins segment names', () => {
    expect(to_pointer([kw('cljsbuild'), 'builds', 0, sym('id')])).toBe('/cljsbuild/builds/0/id');
    expect(to_pointer([])).toBe('/');
    expect(segment_name(kw('a'))).toBe('a');
  });
});

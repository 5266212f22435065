import type { EdnKeyword, EdnSymbol, KeySegment, Path } from '../types';

export function kw(name: string): EdnKeyword {
  return { type: 'keyword', name };
}

export function sym(name: string): EdnSymbol {
  return { type: 'symbol', name };
}

/**
 * 命令行上的路径段：
 * ":builds" → 关键字；"0" / "12" → 下标；其余按字符串（文本名）匹配。
 */
export function parse_segment(raw: string): KeySegment {
  if (raw.length > 1 && raw.startsWith(':')) return kw(raw.slice(1));
  if (/^\d+$/.test(raw)) return Number(raw);
  return raw;
}

/** 路径 → JSON Pointer 风格字符串，如 "/cljsbuild/builds/0" */
export function to_pointer(path: Path): string {
  return '/' + path.map(segment_name).join('/');
}

export function segment_name(segment: KeySegment): string {
  if (typeof segment === 'object') return segment.name;
  return String(segment);
}

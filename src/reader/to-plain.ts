import type { EdnValue } from '../types';
import { print_edn } from './print-edn';

/**
 * EdnValue → 普通 JS 数据（供 zod schema 校验）：
 * - map → 对象，键取文本名（:output-to / "output-to" / output-to 都变成 "output-to"）
 * - vector / list / set → 数组
 * - keyword / symbol → 名字字符串；char → 单字符字符串
 * - 带标签字面量 → 内部的值
 */
export function to_plain(value: EdnValue): unknown {
  if (value === null || typeof value !== 'object') return value;

  switch (value.type) {
    case 'keyword':
    case 'symbol':
      return value.name;
    case 'char':
      return value.value;
    case 'list':
    case 'vector':
    case 'set':
      return value.items.map(to_plain);
    case 'map': {
      const out: Record<string, unknown> = {};
      for (const [k, v] of value.entries) set_own(out, plain_key(k), to_plain(v));
      return out;
    }
    case 'tagged':
      return to_plain(value.value);
  }
}

/**
 * 以自有属性写入（"__proto__" 这样的键也只是普通数据键，不会改动原型）
 */
export function set_own(out: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
}

/** map 键的文本名 */
export function plain_key(key: EdnValue): string {
  if (typeof key === 'string') return key;
  if (key !== null && typeof key === 'object' && (key.type === 'keyword' || key.type === 'symbol')) {
    return key.name;
  }
  return print_edn(key);
}

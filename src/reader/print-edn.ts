import type { EdnValue } from '../types';

const CHAR_NAMES: Record<string, string> = {
  '\n': 'newline',
  ' ': 'space',
  '\t': 'tab',
  '\r': 'return',
  '\b': 'backspace',
  '\f': 'formfeed',
};

/** EdnValue → 紧凑的 EDN 文本（CLI 展示、非字符串 map 键的文本名） */
export function print_edn(value: EdnValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return '##NaN';
    if (value === Infinity) return '##Inf';
    if (value === -Infinity) return '##-Inf';
    return String(value);
  }
  if (typeof value === 'string') return JSON.stringify(value);

  switch (value.type) {
    case 'keyword':
      return `:${value.name}`;
    case 'symbol':
      return value.name;
    case 'char':
      return `\\${CHAR_NAMES[value.value] ?? value.value}`;
    case 'list':
      return `(${value.items.map(print_edn).join(' ')})`;
    case 'vector':
      return `[${value.items.map(print_edn).join(' ')}]`;
    case 'set':
      return `#{${value.items.map(print_edn).join(' ')}}`;
    case 'map':
      return `{${value.entries.map(([k, v]) => `${print_edn(k)} ${print_edn(v)}`).join(', ')}}`;
    case 'tagged':
      if (value.tag === 'regex' && typeof value.value === 'string') return `#"${value.value}"`;
      return `#${value.tag} ${print_edn(value.value)}`;
  }
}

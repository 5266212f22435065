import type { Cursor } from '../cursor/cursor';
import type { EdnKeyword, EdnSymbol, EdnValue } from './edn.type';

/**
 * 路径中的一段：
 * - string：按文本名匹配 map 的键（关键字 / 字符串 / 符号均可）
 * - EdnKeyword / EdnSymbol：只匹配同类、同名的键
 * - number：序列下标（非负整数）
 */
export type KeySegment = string | number | EdnKeyword | EdnSymbol;

/** 从浅到深的路径，至少一段 */
export type Path = readonly KeySegment[];

/** resolve 成功时的完整结果；失败时整体为 null，不存在“半成品” */
export interface Location {
  /** 文件标识（文件路径，或调用方给的名字） */
  file: string;
  /** 行号（从 1 开始） */
  line: number;
  /** 列号（从 1 开始，来自解析器记录的位置） */
  column: number;
  /** 该位置解码后的值；解码失败为 undefined */
  value: EdnValue | undefined;
  /** 命中的是 map 的键（value 为配对的值）还是元素本身 */
  at: 'key' | 'element';
  /** 调用方传入的原始路径 */
  path: Path;
  /** 命中位置的游标（供调用方继续导航） */
  cursor: Cursor;
}

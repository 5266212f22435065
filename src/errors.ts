import type { Position } from './types';

/** EDN 文本无法解析（未闭合的集合 / 字符串、多余的右括号等） */
export class EdnParseError extends Error {
  readonly position: Position;

  constructor(message: string, position: Position) {
    super(`line ${position.line}:${position.column}: ${message}`);
    this.name = 'EdnParseError';
    this.position = position;
  }
}

/**
 * 调用方违反前置条件（程序错误，不是“找不到”）：
 * 例如对序列节点使用非整数的路径段，或传入空路径。
 */
export class PathContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PathContractError';
  }
}

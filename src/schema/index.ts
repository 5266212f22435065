import type { SourcePoint, ValidationIssue } from '../types';
import key_docs_json from './key-docs.json';

export * from './compiler-options.schema';
export * from './project.schema';

/**
 * 键 → 文档 的有序表：模块加载时构建一次，之后只读。
 */
export const key_docs: ReadonlyMap<string, string> = new Map(Object.entries(key_docs_json));

/** 键的文档；未登记的键返回 undefined */
export function doc_for_key(name: string): string | undefined {
  return key_docs.get(name);
}

/** 构造统一的校验问题对象 */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string,
  location?: SourcePoint
): ValidationIssue {
  return { code, path, message, hint, location };
}

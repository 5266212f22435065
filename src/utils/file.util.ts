import { readFileSync } from 'node:fs';

/**
 * 同步读取整个文本文件；文件不存在时返回 null。
 * 其余 IO 错误（权限、目标是目录等）照常抛出。
 */
export function read_text_if_exists(file: string): string | null {
  try {
    return readFileSync(file, 'utf8');
  } catch (err) {
    if (is_not_found(err)) return null;
    throw err;
  }
}

export function is_not_found(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

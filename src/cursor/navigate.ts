import { NodeKind } from '../types';
import type { CstNode } from '../types';
import { drop, filter_iter, first, lazy, take_while } from '../utils/iter.util';
import { is_delimiter, is_insignificant, is_root } from './classify';
import { down, next, right, up } from './cursor';
import type { Cursor, Step } from './cursor';

/**
 * 从 cursor 出发反复应用 step，直到 step 返回 null。
 * 结果包含 cursor 自身；每次迭代都从头开始（可重启），树有限故序列有限。
 */
export function direction(step: Step, cursor: Cursor | null): Iterable<Cursor> {
  return lazy(function* () {
    for (let cur = cursor; cur; cur = step(cur)) yield cur;
  });
}

export function direction_find(step: Step, pred: (cursor: Cursor) => boolean, cursor: Cursor): Cursor | null {
  return first(filter_iter(direction(step, cursor), pred));
}

/** 向上走到文档根节点；游标不在完整文档树里时返回 null */
export function to_root(cursor: Cursor): Cursor | null {
  return direction_find(up, (c) => is_root(c.node), cursor);
}

/** 最顶层的祖先（不要求是 Root 节点） */
export function topmost(cursor: Cursor): Cursor {
  let cur = cursor;
  while (cur.parent) cur = cur.parent;
  return cur;
}

/** 从 cursor 开始按文档顺序查找第一个满足 pred 的节点 */
export function find_first(pred: (node: CstNode) => boolean, cursor: Cursor): Cursor | null {
  return direction_find(next, (c) => pred(c.node), cursor);
}

/**
 * 只经过“会被读到”的形式的先序遍历：
 * 不进入 #_ 丢弃的形式；^meta 只进入被修饰的目标，不进入元数据本身。
 */
export const next_form: Step = (cursor) => {
  const child = enter_form(cursor);
  if (child) return child;
  for (let cur: Cursor | null = cursor; cur; cur = cur.parent) {
    const sibling = right(cur);
    if (sibling) return sibling;
  }
  return null;
};

function enter_form(cursor: Cursor): Cursor | null {
  switch (cursor.node.kind) {
    case NodeKind.Discard:
      return null;
    case NodeKind.Meta:
      return wrapped_form(cursor);
    default:
      return down(cursor);
  }
}

/** 同 find_first，但跳过丢弃形式与元数据 */
export function find_first_form(pred: (node: CstNode) => boolean, cursor: Cursor): Cursor | null {
  return direction_find(next_form, (c) => pred(c.node), cursor);
}

/** ^meta / #tag / 'quote 等包装节点所包装的形式：最后一个有意义的子节点 */
export function wrapped_form(cursor: Cursor): Cursor | null {
  const marker = down(cursor);
  if (!marker) return null;
  let last: Cursor | null = null;
  for (const child of drop(1, siblings_rightward(marker))) last = child;
  return last;
}

/** cursor 及其右侧的有意义兄弟（跳过空白 / 换行 / 注释），保持相对顺序 */
export function siblings_rightward(cursor: Cursor): Iterable<Cursor> {
  return filter_iter(direction(right, cursor), (c) => !is_insignificant(c.node));
}

/**
 * 集合内的有意义元素：跳过开定界符，在闭定界符处停止。
 */
export function elements(collection: Cursor): Iterable<Cursor> {
  return take_while(drop(1, siblings_rightward_from(down(collection))), (c) => !is_delimiter(c.node));
}

function siblings_rightward_from(cursor: Cursor | null): Iterable<Cursor> {
  return cursor ? siblings_rightward(cursor) : [];
}

/** 键右侧配对的值；键已是最后一个元素时返回 null */
export function next_value(cursor: Cursor): Cursor | null {
  const value = first(drop(1, siblings_rightward(cursor)));
  return value && !is_delimiter(value.node) ? value : null;
}

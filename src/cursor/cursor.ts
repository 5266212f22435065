import type { CstNode } from '../types';

/**
 * 不可变游标：当前节点 + 父游标链 + 在父节点 children 中的下标。
 *
 * 所有移动操作都返回新的游标（或 null 表示无法移动），
 * 从不修改树或原游标，因此多个游标可以放心共享同一棵树。
 */
export interface Cursor {
  readonly node: CstNode;
  readonly parent: Cursor | null;
  readonly index: number;
}

/** 单步移动函数：direction() 等导航工具的参数 */
export type Step = (cursor: Cursor) => Cursor | null;

export function root_cursor(node: CstNode): Cursor {
  return { node, parent: null, index: 0 };
}

export function children_of(node: CstNode): readonly CstNode[] {
  return 'children' in node ? node.children : [];
}

function at(parent: Cursor, index: number): Cursor | null {
  const siblings = children_of(parent.node);
  if (index < 0 || index >= siblings.length) return null;
  return { node: siblings[index], parent, index };
}

export const up: Step = (cursor) => cursor.parent;

/** 第一个子节点 */
export const down: Step = (cursor) => at(cursor, 0);

export const right: Step = (cursor) => (cursor.parent ? at(cursor.parent, cursor.index + 1) : null);

export const left: Step = (cursor) => (cursor.parent ? at(cursor.parent, cursor.index - 1) : null);

/**
 * 文档顺序（先序遍历）的下一个节点：
 * 先进入子节点，否则右兄弟，否则回溯到最近一个有右兄弟的祖先。
 * 遍历结束返回 null。
 */
export const next: Step = (cursor) => {
  const child = down(cursor);
  if (child) return child;
  for (let cur: Cursor | null = cursor; cur; cur = cur.parent) {
    const sibling = right(cur);
    if (sibling) return sibling;
  }
  return null;
};

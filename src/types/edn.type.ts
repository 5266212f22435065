/**
 * EDN 解码后的值模型
 *
 * nil / true / false / 数字 / 字符串 直接映射为 JS 原生值；
 * 其余类型用带 type 判别字段的对象表示，便于 switch 穷举。
 */
export type EdnValue =
  | null
  | boolean
  | number
  | string
  | EdnKeyword
  | EdnSymbol
  | EdnChar
  | EdnList
  | EdnVector
  | EdnMap
  | EdnSet
  | EdnTagged;

/** :name 或 :ns/name（name 含命名空间部分，不含冒号） */
export interface EdnKeyword {
  type: 'keyword';
  name: string;
}

export interface EdnSymbol {
  type: 'symbol';
  name: string;
}

/** \a \newline A */
export interface EdnChar {
  type: 'char';
  value: string;
}

export interface EdnList {
  type: 'list';
  items: EdnValue[];
}

export interface EdnVector {
  type: 'vector';
  items: EdnValue[];
}

/** 保留书写顺序的键值对 */
export interface EdnMap {
  type: 'map';
  entries: Array<[EdnValue, EdnValue]>;
}

export interface EdnSet {
  type: 'set';
  items: EdnValue[];
}

/** #inst "..." / #uuid "..." 等带标签字面量 */
export interface EdnTagged {
  type: 'tagged';
  tag: string;
  value: EdnValue;
}

/**
 * 具体语法树（CST）节点类型
 *
 * 与 AST 不同，CST 保留源文本中的每一个字符（空白、换行、逗号、注释、定界符），
 * 按文档顺序拼接所有叶子节点的 text 即可逐字节还原原文。
 */
export enum NodeKind {
  /** 文档根节点 */
  Root = 'root',
  Map = 'map',
  Vector = 'vector',
  List = 'list',
  Set = 'set',
  /** 符号（symbolic name），如 defproject / foo.core */
  Symbol = 'symbol',
  /** 关键字（keyword token），如 :output-to */
  Keyword = 'keyword',
  /** 字面量：字符串、数字、字符、正则 */
  Literal = 'literal',
  /** 集合定界符：( ) [ ] { } #{ */
  Delimiter = 'delimiter',
  /** 空白（空格 / tab / 逗号 / 单独的 \r） */
  Whitespace = 'whitespace',
  Newline = 'newline',
  Comment = 'comment',
  /** #_form：读取时丢弃的形式 */
  Discard = 'discard',
  /** #tag form */
  Tagged = 'tagged',
  /** ^meta form */
  Meta = 'meta',
  /** 'form / `form / ~form / ~@form / @form */
  Prefix = 'prefix',
}

/** 叶子节点的 kind（内容为原始文本） */
export type LeafKind =
  | NodeKind.Symbol
  | NodeKind.Keyword
  | NodeKind.Literal
  | NodeKind.Delimiter
  | NodeKind.Whitespace
  | NodeKind.Newline
  | NodeKind.Comment;

/** 分支节点的 kind（内容为子节点） */
export type BranchKind = Exclude<NodeKind, LeafKind>;

/** 源码位置：offset 从 0 开始；line / column 从 1 开始 */
export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface LeafNode {
  readonly kind: LeafKind;
  readonly start: Position;
  readonly text: string;
}

export interface BranchNode {
  readonly kind: BranchKind;
  readonly start: Position;
  readonly children: readonly CstNode[];
}

export type CstNode = LeafNode | BranchNode;

export type * from './cst.type';
export type * from './edn.type';
export type * from './issue.type';
export type * from './location.type';
export type * from './validate.type';
export { NodeKind } from './cst.type';

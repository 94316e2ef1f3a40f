export type * from './issue.type';
export type * from './parse.type';
export type * from './compile.type';
export type * from './descriptor.type';

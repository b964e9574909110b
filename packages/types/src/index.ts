export type * from './logging/index.js';
export type * from './blocks/index.js';
export type * from './widget/index.js';
export type * from './forms/index.js';
export type * from './template/index.js';

export type * from './album.js';
export type * from './config.js';

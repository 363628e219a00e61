export type * from './covjson.js';
export type * from './erddap.js';

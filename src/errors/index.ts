export * from './FsError.js';
export * from './translate.js';

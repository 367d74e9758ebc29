export * from './analysis';
export * from './batch';
export * from './cache';
export * from './dispatch';
export * from './monitoring';
export * from './notification';
export * from './provider';
export * from './request';
export * from './settings';

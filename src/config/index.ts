export * from './types';
export * from './loader';
export * from './validator';
export * from './naming';
export * from './defaults';
export * from './credentials';

export * from './types';
export * from './defaults';
export * from './queryBuilder';
export * from './programLoader';

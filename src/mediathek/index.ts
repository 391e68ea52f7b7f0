export * from './types';
export * from './mediathekClient';

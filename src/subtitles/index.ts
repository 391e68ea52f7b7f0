export * from './types';
export * from './ttmlParser';
export * from './cueMerger';
export * from './subtitleHandler';

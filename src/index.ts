export * from './config';
export * from './programs';
export * from './mediathek';
export * from './subtitles';
export * from './video';
export * from './output';
export * from './pipelines';
export * from './cli';

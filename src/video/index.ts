export * from './archive';
export * from './videoHandler';

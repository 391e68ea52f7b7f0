export * from './csv';
export * from './paths';
export * from './metadataWriter';

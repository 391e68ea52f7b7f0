export * from './timeWindow';
export * from './scraperPipeline';

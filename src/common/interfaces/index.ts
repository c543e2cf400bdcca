export * from './pipeline.interface';
export * from './features.interface';

export * from './loader';
export * from './validator';

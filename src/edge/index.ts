export * from './edge-api';
export * from './memory-edge-api';
export * from './throttled-edge-api';

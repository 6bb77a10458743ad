export * from './decision-source';
export * from './diff';
export * from './normalizer';
export * from './orchestrator';
export * from './partitioner';
export * from './reconciler';
export * from './retry';
export * from './scheduler';
export * from './snippets';
export * from './state-machine';
export * from './version-manager';
export * from './worker-pool';

/**
 * Edge Decision Sync: reconciles blocking decisions onto CDN edge services.
 *
 * Public exports for embedding. The host process supplies a DecisionSource
 * and an EdgeApi per account, then starts the orchestrator and, optionally,
 * the status API.
 */

export { createApp, createSyncContext, startStatusServer } from './server';
export type { SyncContext, SyncContextDeps } from './server';
export * from './domain';
export * from './engine';
export * from './edge';
export * from './storage';
export * from './config';
export * from './data-plane';
export { createLogger, logger, parseLogLevel, redactContext, resetLogHandler, setLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogContext, LogEntry, LogHandler } from './logger';

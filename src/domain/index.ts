/**
 * Domain model exports.
 */

export * from './config';
export * from './decision';
export * from './errors';
export * from './events';
export * from './service';

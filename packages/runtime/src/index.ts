export { log, initializeLogger, shutdownLogger, defaultLogLevel } from './log/index.js';
export type { LogLevel, LoggerConfig, Logger } from './log/index.js';

export { ReadWriteLock } from './lock/index.js';
export type { LockMode } from './lock/index.js';

export { ExpirationPolicy } from './expiration/index.js';
export type { ExpirationPolicyOptions } from './expiration/index.js';

export { ExpirySweeper } from './sweeper/index.js';
export type { ExpirySweeperOptions, SweeperState } from './sweeper/index.js';

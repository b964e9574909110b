export type { ILogger, ILogMethod } from './ILogger.js';

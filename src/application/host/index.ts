/**
 * scopeline - Hosting Module
 *
 * Application host and logging
 */

// Logging
export type { ILogger } from './logger';
export { consoleLogger, silentLogger } from './logger';

// Application
export { ScopelineApp, createApp } from './app';
export type { ScopelineAppOptions, HandleOptions } from './app';

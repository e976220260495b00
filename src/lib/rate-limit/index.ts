/**
 * Rate Limit System
 * Main export file for the per-host domain throttle
 */

export * from './rate-limit.types';
export { DomainThrottle } from './domain-throttle';

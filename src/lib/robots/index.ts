/**
 * Robots System
 * Main export file for robots.txt handling
 */

export * from './robots.types';
export { RobotsPolicy, fetchRobotsTxt } from './robots.policy';

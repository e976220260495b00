/**
 * Robots Types
 */

export interface RobotsConfig {
  enabled: boolean;
  userAgent: string;
  cacheTtlMs: number;   // How long a host's robots.txt is trusted
  timeoutMs: number;    // Fetch timeout for robots.txt itself
}

/**
 * Resolves to the robots.txt body, or null when the host has none worth reading
 */
export type RobotsFetcher = (robotsUrl: string, timeoutMs: number, userAgent: string) => Promise<string | null>;

export interface RobotsVerdict {
  allowed: boolean;
  /** Crawl-delay for our agent, in milliseconds */
  crawlDelayMs?: number;
}

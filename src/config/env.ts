import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Result persistence
  RESULT_STORE: process.env.RESULT_STORE || 'file', // 'file' | 'mongo'
  OUTPUT_DIR: process.env.OUTPUT_DIR || './scrapes_out',
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/scrape-engine',

  // Jobs & workers
  MAX_CONCURRENT_JOBS: parseInt(process.env.MAX_CONCURRENT_JOBS || '5', 10),
  WORKER_COUNT: parseInt(process.env.WORKER_COUNT || process.env.MAX_CONCURRENT_JOBS || '5', 10),
  MAX_QUEUE_SIZE: parseInt(process.env.MAX_QUEUE_SIZE || '100', 10),
  JOB_RETENTION_MAX: parseInt(process.env.JOB_RETENTION_MAX || '1000', 10),
  JOB_RETENTION_TTL: parseInt(process.env.JOB_RETENTION_TTL || '86400000', 10), // 24 hours

  // Browser pool
  MAX_PLAYWRIGHT_INSTANCES: parseInt(process.env.MAX_PLAYWRIGHT_INSTANCES || '3', 10),
  BROWSER_ACQUIRE_TIMEOUT: parseInt(process.env.BROWSER_ACQUIRE_TIMEOUT || '30000', 10),
  NAVIGATION_TIMEOUT: parseInt(process.env.NAVIGATION_TIMEOUT || '30000', 10),

  // Static fetch
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '30000', 10),
  MAX_REDIRECTS: parseInt(process.env.MAX_REDIRECTS || '5', 10),
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; ScrapeEngine/0.1)',
  ROTATE_USER_AGENTS: process.env.ROTATE_USER_AGENTS !== 'false', // Default true

  // robots.txt
  RESPECT_ROBOTS_TXT: process.env.RESPECT_ROBOTS_TXT !== 'false', // Default true
  ROBOTS_CACHE_TTL: parseInt(process.env.ROBOTS_CACHE_TTL || '3600000', 10), // 1 hour
  ROBOTS_TIMEOUT: parseInt(process.env.ROBOTS_TIMEOUT || '10000', 10),

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '5', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),
  RETRY_BACKOFF_MULTIPLIER: parseFloat(process.env.RETRY_BACKOFF_MULTIPLIER || '2'),
  RETRY_BACKOFF_MAX: parseInt(process.env.RETRY_BACKOFF_MAX || '30000', 10),

  // Circuit Breaker
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_FAILURE_THRESHOLD || '5', 10),
  CIRCUIT_BREAKER_RECOVERY_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RECOVERY_TIMEOUT || '60000', 10), // 60 seconds

  // Domain throttle
  MAX_CONCURRENT_PER_DOMAIN: parseInt(process.env.MAX_CONCURRENT_PER_DOMAIN || '2', 10),
  REQUEST_DELAY: parseInt(process.env.REQUEST_DELAY || '1000', 10), // politeness gap per host
  THROTTLE_ACQUIRE_TIMEOUT: parseInt(process.env.THROTTLE_ACQUIRE_TIMEOUT || '60000', 10),
} as const;

export default env;

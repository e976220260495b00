/**
 * Request header helpers for the static backend
 */

// Desktop browser identities used when user-agent rotation is on
export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
];

/**
 * Cycles through USER_AGENTS, or always answers the fixed agent when rotation is off
 */
export class UserAgentRotator {
  private index: number = 0;
  private rotate: boolean;
  private fixed: string;

  constructor(rotate: boolean, fixed: string) {
    this.rotate = rotate;
    this.fixed = fixed;
  }

  next(): string {
    if (!this.rotate) {
      return this.fixed;
    }
    const agent = USER_AGENTS[this.index % USER_AGENTS.length];
    this.index++;
    return agent;
  }
}

/**
 * Headers sent with every static page request
 */
export function buildRequestHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
  };
}

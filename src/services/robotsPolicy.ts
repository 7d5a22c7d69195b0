/**
 * Robots.txt policy
 *
 * Fetches robots.txt once per origin and answers whether a URL may be crawled.
 * A missing file (404 and other 4xx) or a network failure allows everything;
 * 401, 403 and 5xx answers disallow the whole origin.
 */

import { HttpTransport } from './httpTransport';

export interface RobotsRules {
  allow: string[];
  disallow: string[];
}

export type RobotsGroups = Map<string, RobotsRules>;

/**
 * Parse robots.txt into rule groups keyed by lowercase user agent
 */
export function parseRobotsTxt(content: string): RobotsGroups {
  const groups: RobotsGroups = new Map();
  let currentAgents: string[] = [];
  let lastWasAgent = false;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.replace(/#.*$/, '').trim();
    if (!trimmed) {
      continue;
    }

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const directive = trimmed.substring(0, colonIndex).trim().toLowerCase();
    const value = trimmed.substring(colonIndex + 1).trim();

    if (directive === 'user-agent') {
      if (!lastWasAgent) {
        currentAgents = [];
      }
      const agent = value.toLowerCase();
      currentAgents.push(agent);
      if (!groups.has(agent)) {
        groups.set(agent, { allow: [], disallow: [] });
      }
      lastWasAgent = true;
      continue;
    }

    lastWasAgent = false;
    if (directive !== 'allow' && directive !== 'disallow') {
      continue;
    }

    for (const agent of currentAgents) {
      const rules = groups.get(agent);
      // An empty Disallow allows everything
      if (!rules || !value) {
        continue;
      }
      if (directive === 'allow') {
        rules.allow.push(value);
      } else {
        rules.disallow.push(value);
      }
    }
  }

  return groups;
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

function longestMatch(patterns: string[], path: string): number {
  let longest = -1;
  for (const pattern of patterns) {
    if (patternToRegExp(pattern).test(path) && pattern.length > longest) {
      longest = pattern.length;
    }
  }
  return longest;
}

/**
 * Product token of the user agent, e.g. "testbot" for "TestBot/1.0 (+https://...)".
 * Browser-style agents have no crawler token of their own.
 */
export function productToken(userAgent: string): string | null {
  const token = userAgent.trim().split(/[\/\s]/)[0].toLowerCase();
  if (!token || token === 'mozilla') {
    return null;
  }
  return token;
}

function selectRules(groups: RobotsGroups, userAgent: string): RobotsRules | undefined {
  const token = productToken(userAgent);
  const named = token ? groups.get(token) : undefined;
  return named ?? groups.get('*');
}

/**
 * Longest matching rule wins; ties go to Allow
 */
export function isPathAllowed(groups: RobotsGroups, userAgent: string, path: string): boolean {
  const rules = selectRules(groups, userAgent);
  if (!rules) {
    return true;
  }

  const disallowed = longestMatch(rules.disallow, path);
  if (disallowed === -1) {
    return true;
  }
  return longestMatch(rules.allow, path) >= disallowed;
}

function disallowAll(): RobotsGroups {
  return new Map([['*', { allow: [], disallow: ['/'] }]]);
}

export class RobotsPolicy {
  private cache: Map<string, RobotsGroups> = new Map();

  constructor(
    private readonly transport: HttpTransport,
    private readonly userAgent: string,
    private readonly timeoutMs: number = 5000
  ) {}

  async isAllowed(url: string): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    const groups = await this.getGroups(parsed.origin);
    return isPathAllowed(groups, this.userAgent, `${parsed.pathname}${parsed.search}`);
  }

  private async getGroups(origin: string): Promise<RobotsGroups> {
    const cached = this.cache.get(origin);
    if (cached) {
      return cached;
    }

    let groups: RobotsGroups = new Map();
    try {
      const response = await this.transport.request<string>({
        url: `${origin}/robots.txt`,
        method: 'GET',
        timeout: this.timeoutMs,
        responseType: 'text',
        headers: { 'User-Agent': this.userAgent },
        validateStatus: () => true
      });

      if (response.status === 200 && typeof response.data === 'string') {
        groups = parseRobotsTxt(response.data);
      } else if (response.status === 401 || response.status === 403 || response.status >= 500) {
        console.warn(`robots.txt for ${origin} answered ${response.status}, treating the site as disallowed`);
        groups = disallowAll();
      }
    } catch (error) {
      console.warn(`Could not check robots.txt for ${origin}:`, error instanceof Error ? error.message : error);
    }

    this.cache.set(origin, groups);
    return groups;
  }
}

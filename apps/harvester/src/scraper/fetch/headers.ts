/**
 * Browser-like request headers
 *
 * Each request picks a User-Agent from a small pool of current desktop
 * browsers and sends the headers that browser would send alongside it.
 */

export type BrowserFamily = 'chromium' | 'firefox' | 'safari'

export interface UserAgentProfile {
  userAgent: string
  family: BrowserFamily
  /** sec-ch-ua brand list, Chromium only */
  clientHints?: string
  platform?: string
}

export const USER_AGENT_POOL: readonly UserAgentProfile[] = [
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    family: 'chromium',
    clientHints: '"Not/A)Brand";v="8", "Chromium";v="126", "Google Chrome";v="126"',
    platform: '"Windows"',
  },
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    family: 'chromium',
    clientHints: '"Google Chrome";v="125", "Chromium";v="125", "Not.A/Brand";v="24"',
    platform: '"macOS"',
  },
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36 Edg/126.0.0.0',
    family: 'chromium',
    clientHints: '"Not/A)Brand";v="8", "Chromium";v="126", "Microsoft Edge";v="126"',
    platform: '"Windows"',
  },
  {
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0',
    family: 'firefox',
  },
  {
    userAgent: 'Mozilla/5.0 (X11; Linux x86_64; rv:126.0) Gecko/20100101 Firefox/126.0',
    family: 'firefox',
  },
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
    family: 'safari',
  },
]

/** Search-engine landing pages used as an occasional referer */
export const REFERERS: readonly string[] = ['https://www.google.com/', 'https://www.google.bg/', 'https://www.bing.com/']

/** Chance that a request carries a referer */
export const REFERER_PROBABILITY = 0.3

const BASE_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'Accept-Language': 'bg-BG,bg;q=0.9,en-US;q=0.8,en;q=0.7',
  'Accept-Encoding': 'gzip, deflate, br',
  'Upgrade-Insecure-Requests': '1',
}

function pick<T>(items: readonly T[], random: () => number): T | undefined {
  return items[Math.floor(random() * items.length)]
}

/**
 * Build the header set for one request. `random` is injectable so tests
 * can pin the browser and the referer decision.
 */
export function buildRequestHeaders(
  random: () => number = Math.random,
  pool: readonly UserAgentProfile[] = USER_AGENT_POOL
): Record<string, string> {
  const profile = pick(pool, random) ?? USER_AGENT_POOL[0]
  const headers: Record<string, string> = { ...BASE_HEADERS }
  if (!profile) return headers

  headers['User-Agent'] = profile.userAgent

  switch (profile.family) {
    case 'chromium':
      if (profile.clientHints) headers['sec-ch-ua'] = profile.clientHints
      headers['sec-ch-ua-mobile'] = '?0'
      if (profile.platform) headers['sec-ch-ua-platform'] = profile.platform
      headers['Sec-Fetch-Dest'] = 'document'
      headers['Sec-Fetch-Mode'] = 'navigate'
      headers['Sec-Fetch-Site'] = 'none'
      headers['Sec-Fetch-User'] = '?1'
      break
    case 'firefox':
      headers.DNT = '1'
      headers['Sec-Fetch-Dest'] = 'document'
      headers['Sec-Fetch-Mode'] = 'navigate'
      headers['Sec-Fetch-Site'] = 'none'
      break
    case 'safari':
      break
  }

  if (random() < REFERER_PROBABILITY) {
    const referer = pick(REFERERS, random)
    if (referer) {
      headers.Referer = referer
      if (headers['Sec-Fetch-Site']) headers['Sec-Fetch-Site'] = 'cross-site'
    }
  }

  return headers
}

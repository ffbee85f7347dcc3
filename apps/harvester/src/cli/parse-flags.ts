export type Flags = Record<string, string | boolean>

/**
 * `--key value words --switch` -> { key: 'value words', switch: true }.
 * Tokens before the first flag are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined || !token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    for (let next = argv[j]; next !== undefined && !next.startsWith('--'); next = argv[++j]) {
      valueTokens.push(next)
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * @returns undefined when absent, NaN when present but not an integer
 */
export function asInteger(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return Number.NaN
  }
  return Number.parseInt(value, 10)
}

export function asList(value: string | boolean | undefined): string[] | undefined {
  if (typeof value !== 'string') {
    return undefined
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  return items.length > 0 ? items : undefined
}

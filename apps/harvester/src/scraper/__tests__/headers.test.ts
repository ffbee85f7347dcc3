import { describe, expect, it } from 'vitest'
import { buildRequestHeaders, REFERERS, USER_AGENT_POOL } from '../fetch/headers.js'
import { sequenceRandom } from '../../__tests__/helpers/fakes.js'

describe('buildRequestHeaders', () => {
  it('sends Chromium client hints and a referer when the draw is low', () => {
    const headers = buildRequestHeaders(() => 0)

    expect(headers['User-Agent']).toBe(USER_AGENT_POOL[0]?.userAgent)
    expect(headers['sec-ch-ua-mobile']).toBe('?0')
    expect(headers['sec-ch-ua-platform']).toBe('"Windows"')
    expect(headers.Referer).toBe(REFERERS[0])
    expect(headers['Sec-Fetch-Site']).toBe('cross-site')
    expect(headers.DNT).toBeUndefined()
  })

  it('sends DNT for Firefox and no referer on a high draw', () => {
    const headers = buildRequestHeaders(sequenceRandom(0.5, 0.9))

    expect(headers['User-Agent']).toBe(USER_AGENT_POOL[3]?.userAgent)
    expect(headers.DNT).toBe('1')
    expect(headers['sec-ch-ua']).toBeUndefined()
    expect(headers.Referer).toBeUndefined()
    expect(headers['Sec-Fetch-Site']).toBe('none')
  })

  it('sends only the base headers for Safari', () => {
    const headers = buildRequestHeaders(() => 0.99)

    expect(Object.keys(headers).sort()).toEqual([
      'Accept',
      'Accept-Encoding',
      'Accept-Language',
      'Upgrade-Insecure-Requests',
      'User-Agent',
    ])
  })

  it('never sets a Connection header', () => {
    expect(buildRequestHeaders(() => 0).Connection).toBeUndefined()
  })
})

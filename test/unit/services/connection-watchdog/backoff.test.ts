import { computeBackoffSeconds } from '@services/connection-watchdog/backoff.js'
import { describe, expect, it } from 'vitest'

const config = { baseSeconds: 5, maxSeconds: 60 }

describe('computeBackoffSeconds', () => {
  it('should double from the base and stop at the cap', () => {
    const waits = [1, 2, 3, 4, 5, 6].map((failures) =>
      computeBackoffSeconds(failures, config),
    )
    expect(waits).toEqual([5, 10, 20, 40, 60, 60])
  })

  it('should never decrease and never exceed the cap', () => {
    let previous = 0
    for (let failures = 1; failures <= 100; failures++) {
      const wait = computeBackoffSeconds(failures, config)
      expect(wait).toBeGreaterThanOrEqual(previous)
      expect(wait).toBeLessThanOrEqual(config.maxSeconds)
      previous = wait
    }
  })

  it('should not wait without failures', () => {
    expect(computeBackoffSeconds(0, config)).toBe(0)
  })
})

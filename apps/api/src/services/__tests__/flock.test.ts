import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ValidationError } from '@layerfarm/db'
import { failureOf, openTestFarm, type TestFarm } from './fixtures'

describe('flock.ts', () => {
  let farm: TestFarm

  beforeEach(async () => {
    farm = await openTestFarm()
  })

  afterEach(async () => {
    await farm.store.close()
  })

  describe('population', () => {
    it('should report an empty flock before any head count', async () => {
      expect(await farm.services.flock.getCurrentPopulation()).toEqual({
        totalCount: 0,
        discards: 0,
        date: null,
        time: null,
      })
    })

    it('should treat the latest head count as current', async () => {
      const { flock } = farm.services
      await flock.recordPopulation({ date: '2026-03-01', time: '06:00:00', totalCount: 500 })
      await flock.recordPopulation({ date: '2026-03-08', time: '06:00:00', totalCount: 494, discards: 6 })
      await flock.recordPopulation({ date: '2026-03-05', time: '06:00:00', totalCount: 497, discards: 3 })

      expect(await flock.getCurrentPopulation()).toEqual({
        totalCount: 494,
        discards: 6,
        date: '2026-03-08',
        time: '06:00:00',
      })
      expect(await flock.listPopulation('2026-03-01', '2026-03-05')).toHaveLength(2)
    })
  })

  describe('feed consumption', () => {
    it('should store the total grams for the ration', async () => {
      const { flock } = farm.services
      await flock.recordFeedConsumption({ date: '2026-03-01', time: '06:30:00', perBirdGrams: 110, birdCount: 500 })

      const [ration] = await flock.listFeedConsumption('2026-03-01', '2026-03-01')
      expect(ration.totalGrams).toBe(55000)
      expect(ration.birdCount).toBe(500)
    })

    it('should reject a ration of zero grams', async () => {
      const error = await failureOf(
        farm.services.flock.recordFeedConsumption({ date: '2026-03-01', time: '06:30:00', perBirdGrams: 0, birdCount: 500 }),
        ValidationError,
      )
      expect(error.field).toBe('perBirdGrams')
    })
  })
})

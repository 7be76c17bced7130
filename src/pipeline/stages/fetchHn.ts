import type { StorySource } from '../../sources/hnClient.js'
import { logger } from '../../utils/logger.js'
import type { PipelineState, StateUpdate } from '../state.js'

const log = logger.child('stage:fetch')

// Source errors propagate. An empty result is recorded and the run continues.
export async function fetchHn(state: PipelineState, source: StorySource, now: () => number): Promise<StateUpdate> {
  const { profile } = state
  const startTime = now()
  const minScore = Math.trunc(profile.minScore)

  log.info('Fetching stories', { type: profile.fetchType, count: profile.fetchCount, minScore })

  const stories = await source.fetchStories(profile.fetchType, profile.fetchCount, minScore)

  if (stories.length === 0) {
    log.warn('No stories found from HN API')

    return { stories: [], errors: ['No stories found from HN API'], startTime }
  }

  log.info(`Fetched ${stories.length} stories`)

  return { stories, startTime }
}

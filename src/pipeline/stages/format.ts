import type { Digest } from '../../types.js'
import { logger } from '../../utils/logger.js'
import type { PipelineState, StateUpdate } from '../state.js'

const log = logger.child('stage:format')

export function formatDigest(state: PipelineState, now: () => number): StateUpdate {
  const finishedAt = now()
  const articles = state.rankedArticles.slice(0, state.profile.maxArticles)

  const digest: Digest = {
    articles,
    timestamp: new Date(finishedAt).toISOString(),
    stats: {
      fetched: state.stories.length,
      filtered: state.filteredArticles.length,
      final: articles.length,
      errors: state.errors.length,
      generationTimeMs: Math.max(0, Math.round(finishedAt - state.startTime))
    }
  }

  log.info(`Generated digest with ${articles.length} articles`, { ...digest.stats })

  return { digest }
}

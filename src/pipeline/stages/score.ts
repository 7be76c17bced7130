import { logger } from '../../utils/logger.js'
import type { ScorerOptions } from '../scoring.js'
import { ArticleScorer } from '../scoring.js'
import type { PipelineState, StateUpdate } from '../state.js'

const log = logger.child('stage:score')

export function scoreArticles(state: PipelineState, options: ScorerOptions = {}): StateUpdate {
  if (state.summarizedArticles.length === 0) return { scoredArticles: [] }

  const scorer = new ArticleScorer(state.profile, options)
  const scoredArticles = scorer.scoreArticles(state.summarizedArticles)

  log.info(`Scored ${scoredArticles.length} articles`, { input: state.summarizedArticles.length })

  return { scoredArticles }
}

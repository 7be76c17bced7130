import { rankArticles as sortByFinalScore } from '../scoring.js'
import type { PipelineState, StateUpdate } from '../state.js'

export function rankArticles(state: PipelineState): StateUpdate {
  return { rankedArticles: sortByFinalScore(state.scoredArticles) }
}

import type { ExtractedArticle } from '../../types.js'
import { hasContent, isSummarizable } from '../../types.js'
import { logger } from '../../utils/logger.js'
import type { PipelineState, StateUpdate } from '../state.js'

const log = logger.child('stage:filter')

export function keepSummarizable(articles: readonly ExtractedArticle[]): ExtractedArticle[] {
  return articles.filter(article => isSummarizable(article.status) && hasContent(article))
}

export function filterArticles(state: PipelineState): StateUpdate {
  const filteredArticles = keepSummarizable(state.articles)

  log.info(`Kept ${filteredArticles.length} of ${state.articles.length} articles`, {
    dropped: state.articles.length - filteredArticles.length
  })

  return { filteredArticles }
}

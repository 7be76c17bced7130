import { hasSummary } from '../../types.js'
import { logger } from '../../utils/logger.js'
import type { PipelineState, StateUpdate } from '../state.js'
import type { ArticleSummarizer } from '../summarizer.js'

const log = logger.child('stage:summarize')

export async function summarizeArticles(state: PipelineState, summarizer: ArticleSummarizer): Promise<StateUpdate> {
  const articles = state.filteredArticles

  if (articles.length === 0) {
    log.warn('No articles to summarize after filtering')

    return { summarizedArticles: [], errors: ['No articles to summarize after filtering'] }
  }

  const summarizedArticles = await summarizer.summarizeBatch(articles)

  const errors = summarizedArticles
    .filter(item => item.errorMessage !== null)
    .map(item => `Article ${item.article.storyId} (${item.article.title}): ${item.errorMessage}`)

  log.info(`Summarized ${articles.length} articles`, {
    successful: summarizedArticles.filter(hasSummary).length,
    failed: errors.length
  })

  return { summarizedArticles, errors }
}

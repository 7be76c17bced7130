import pLimit from 'p-limit'
import { DEFAULT_MAX_CONCURRENT } from '../../constants.js'
import { errorMessage } from '../../errors.js'
import type { Story } from '../../types.js'
import { EXTRACTION_STATUS } from '../../types.js'
import { logger } from '../../utils/logger.js'
import type { ArticleSource } from '../articleExtractor.js'
import { countByStatus, createArticle } from '../articleExtractor.js'
import type { PipelineState, StateUpdate } from '../state.js'
import { mergeUpdates } from '../state.js'

const log = logger.child('stage:extract')

// One branch per story. Never rejects: an exception becomes a failed article plus one error line.
export async function fetchArticle(story: Story, source: ArticleSource): Promise<StateUpdate> {
  try {
    const article = await source.extractOne(story)

    log.debug(`Story ${story.id} extracted`, { status: article.status, words: article.wordCount })

    return { articles: [article] }
  } catch (error) {
    const message = errorMessage(error)

    log.error(`Failed to extract article ${story.id}`, { error: message })

    return {
      articles: [createArticle(story, EXTRACTION_STATUS.failed, { errorMessage: message })],
      errors: [`Article ${story.id} (${story.title}): ${message}`]
    }
  }
}

// Every branch joins before the update is returned. Contributions are merged in story order.
export async function fetchArticles(
  state: PipelineState,
  source: ArticleSource,
  maxConcurrent = DEFAULT_MAX_CONCURRENT
): Promise<StateUpdate> {
  if (state.stories.length === 0) return {}

  const limit = pLimit(maxConcurrent)
  const updates = await Promise.all(state.stories.map(story => limit(() => fetchArticle(story, source))))
  const merged = mergeUpdates(updates)

  log.info(`Extracted ${state.stories.length} articles`, countByStatus(merged.articles ?? []))

  return merged
}

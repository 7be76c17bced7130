import { DEFAULT_MAX_CONCURRENT } from '../constants.js'
import { errorMessage, HnClientError, PipelineError, SourceUnavailableError } from '../errors.js'
import type { UserProfile } from '../profile.js'
import type { StorySource } from '../sources/hnClient.js'
import type { Digest } from '../types.js'
import { logger } from '../utils/logger.js'
import type { ArticleSource } from './articleExtractor.js'
import type { ScorerOptions } from './scoring.js'
import { fetchArticles } from './stages/fetchArticle.js'
import { fetchHn } from './stages/fetchHn.js'
import { filterArticles } from './stages/filter.js'
import { formatDigest } from './stages/format.js'
import { rankArticles } from './stages/rank.js'
import { scoreArticles } from './stages/score.js'
import { summarizeArticles } from './stages/summarize.js'
import type { PipelineState, StateUpdate } from './state.js'
import { initialState, mergeState } from './state.js'
import type { ArticleSummarizer } from './summarizer.js'

// Constants

export const STAGE_MESSAGES = {
  fetch: 'Fetching HN stories...',
  extract: 'Extracting article content...',
  filter: 'Filtering articles...',
  summarize: 'Summarizing with AI...',
  score: 'Scoring relevance...',
  rank: 'Ranking articles...',
  format: 'Formatting digest...'
} as const

const log = logger.child('pipeline')

// Types

export type StageName = keyof typeof STAGE_MESSAGES

export interface StageEvent {
  stage: StageName
  message: string
}

export interface PipelineDeps {
  source: StorySource
  extractor: ArticleSource
  summarizer: ArticleSummarizer
  scoring?: ScorerOptions
  maxConcurrentFetches?: number
  now?: () => number
}

export interface PipelineRunOptions {
  onStage?: (event: StageEvent) => void
}

export interface PipelineResult {
  digest: Digest
  state: PipelineState
}

type Stage = (state: PipelineState) => StateUpdate | Promise<StateUpdate>

// Main Function

// Resolves with a digest, possibly empty, or rejects with a PipelineError. Per-item failures only lower the counts.
export async function runDigestPipeline(
  profile: UserProfile,
  deps: PipelineDeps,
  options: PipelineRunOptions = {}
): Promise<PipelineResult> {
  const now = deps.now ?? Date.now

  const stages: Array<[StageName, Stage]> = [
    ['fetch', state => fetchHn(state, deps.source, now)],
    ['extract', state => fetchArticles(state, deps.extractor, deps.maxConcurrentFetches ?? DEFAULT_MAX_CONCURRENT)],
    ['filter', filterArticles],
    ['summarize', state => summarizeArticles(state, deps.summarizer)],
    ['score', state => scoreArticles(state, deps.scoring)],
    ['rank', rankArticles],
    ['format', state => formatDigest(state, now)]
  ]

  let state = initialState(profile, now())

  for (const [stage, run] of stages) {
    options.onStage?.({ stage, message: STAGE_MESSAGES[stage] })

    try {
      state = mergeState(state, await run(state))
    } catch (error) {
      if (stage === 'fetch' && error instanceof HnClientError) {
        log.error('HN API unavailable', { error: error.message })

        throw new SourceUnavailableError(`HN API unavailable: ${error.message}`, { cause: error })
      }

      log.error(`Stage ${stage} failed`, { error: errorMessage(error) })

      throw new PipelineError(`Pipeline failed during ${stage}: ${errorMessage(error)}`, { cause: error })
    }
  }

  if (!state.digest) {
    throw new PipelineError('Pipeline completed without producing a digest')
  }

  log.info('Pipeline finished', { errors: state.errors.length })

  return { digest: state.digest, state }
}

import type { UserProfile } from '../profile.js'
import type { Digest, ExtractedArticle, ScoredArticle, Story, SummarizedArticle } from '../types.js'

// Types

export interface PipelineState {
  readonly profile: UserProfile
  readonly stories: readonly Story[]
  // Accumulator: each extraction branch contributes one article.
  readonly articles: readonly ExtractedArticle[]
  readonly filteredArticles: readonly ExtractedArticle[]
  readonly summarizedArticles: readonly SummarizedArticle[]
  readonly scoredArticles: readonly ScoredArticle[]
  readonly rankedArticles: readonly ScoredArticle[]
  readonly digest: Digest | null
  // Accumulator: every stage may append diagnostics.
  readonly errors: readonly string[]
  readonly startTime: number
}

export type StateUpdate = Partial<Omit<PipelineState, 'profile'>>

// Main Functions

export function initialState(profile: UserProfile, startTime: number): PipelineState {
  return {
    profile,
    stories: [],
    articles: [],
    filteredArticles: [],
    summarizedArticles: [],
    scoredArticles: [],
    rankedArticles: [],
    digest: null,
    errors: [],
    startTime
  }
}

// `articles` and `errors` append; every other field is replaced.
export function mergeState(state: PipelineState, update: StateUpdate): PipelineState {
  return {
    ...state,
    ...update,
    articles: update.articles ? [...state.articles, ...update.articles] : state.articles,
    errors: update.errors ? [...state.errors, ...update.errors] : state.errors
  }
}

export function mergeUpdates(updates: readonly StateUpdate[]): StateUpdate {
  return {
    articles: updates.flatMap(update => update.articles ?? []),
    errors: updates.flatMap(update => update.errors ?? [])
  }
}

import { ScoringConfigError } from '../errors.js'
import type { UserProfile } from '../profile.js'
import { hasPreferences } from '../profile.js'
import type { RelevanceScore, ScoredArticle, SummarizedArticle } from '../types.js'
import { createScoredArticle, displayTags, isFiltered } from '../types.js'
import { logger } from '../utils/logger.js'

// Constants

export const NEUTRAL_SCORE = 0.5

export const DISINTEREST_SCORE = 0.1

const DEFAULT_RELEVANCE_WEIGHT = 0.7

const DEFAULT_POPULARITY_WEIGHT = 0.3

const DEFAULT_MAX_HN_SCORE = 500

const log = logger.child('scoring')

// Types

export interface ScorerOptions {
  relevanceWeight?: number
  popularityWeight?: number
  maxHnScore?: number
}

export interface ScoreArticlesOptions {
  filterBelowMin?: boolean
}

// Helpers

function relevance(score: number, reason: string, interest: string[] = [], disinterest: string[] = []): RelevanceScore {
  return { score, reason, matchedInterestTags: interest, matchedDisinterestTags: disinterest }
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1)
}

// Stable: equal scores keep their input order.
export function rankArticles(articles: readonly ScoredArticle[]): ScoredArticle[] {
  return [...articles].sort((a, b) => b.finalScore - a.finalScore)
}

// Main Class

export class ArticleScorer {
  readonly relevanceWeight: number
  readonly popularityWeight: number
  readonly maxHnScore: number

  constructor(
    private readonly profile: UserProfile,
    options: ScorerOptions = {}
  ) {
    this.relevanceWeight = options.relevanceWeight ?? DEFAULT_RELEVANCE_WEIGHT
    this.popularityWeight = options.popularityWeight ?? DEFAULT_POPULARITY_WEIGHT
    this.maxHnScore = options.maxHnScore ?? DEFAULT_MAX_HN_SCORE

    if (this.relevanceWeight < 0 || this.popularityWeight < 0) {
      throw new ScoringConfigError('Weights must be non-negative')
    }

    if (this.relevanceWeight + this.popularityWeight > 1) {
      throw new ScoringConfigError('Sum of weights must not exceed 1.0')
    }

    if (!(this.maxHnScore > 0)) {
      throw new ScoringConfigError('maxHnScore must be positive')
    }
  }

  // Disinterest beats interest. Interest interpolates from neutral (no match) to 1.0 (every interest tag).
  calculateRelevance(articleTags: readonly string[]): RelevanceScore {
    if (articleTags.length === 0) return relevance(NEUTRAL_SCORE, 'No tags to match')

    if (!hasPreferences(this.profile)) return relevance(NEUTRAL_SCORE, 'No preferences configured')

    const tags = new Set(articleTags.map(tag => tag.toLowerCase()))
    const interest = this.profile.interestTags.filter(tag => tags.has(tag))
    const disinterest = this.profile.disinterestTags.filter(tag => tags.has(tag))

    if (disinterest.length > 0) {
      return relevance(DISINTEREST_SCORE, `Contains avoided topics: ${disinterest.join(', ')}`, interest, disinterest)
    }

    if (interest.length > 0) {
      const ratio = interest.length / this.profile.interestTags.length

      return relevance(NEUTRAL_SCORE + ratio * 0.5, `Matches interests: ${interest.join(', ')}`, interest)
    }

    return relevance(NEUTRAL_SCORE, 'No specific interest match')
  }

  // A lone score has nothing to compare against, so it falls back to the absolute scale.
  normalizePopularity(hnScore: number, batchScores?: readonly number[]): number {
    if (batchScores && batchScores.length > 1) {
      const min = Math.min(...batchScores)
      const max = Math.max(...batchScores)

      if (max > min) return clamp01((hnScore - min) / (max - min))

      return NEUTRAL_SCORE
    }

    return Math.min(hnScore / this.maxHnScore, 1)
  }

  scoreArticle(article: SummarizedArticle, batchScores?: readonly number[]): ScoredArticle {
    const relevanceScore = this.calculateRelevance(displayTags(article))
    const popularity = this.normalizePopularity(article.article.hnScore, batchScores)
    const finalScore = clamp01(this.relevanceWeight * relevanceScore.score + this.popularityWeight * popularity)

    log.debug(`Scored article ${article.article.storyId}`, {
      relevance: relevanceScore.score,
      popularity,
      final: finalScore
    })

    return createScoredArticle(article, relevanceScore, popularity, finalScore)
  }

  scoreArticles(articles: readonly SummarizedArticle[], options: ScoreArticlesOptions = {}): ScoredArticle[] {
    const { filterBelowMin = true } = options

    if (articles.length === 0) return []

    const batchScores = articles.map(article => article.article.hnScore)
    const scored = articles.map(article => this.scoreArticle(article, batchScores))

    const kept =
      filterBelowMin && this.profile.minScore > 0
        ? scored.filter(article => !isFiltered(article, this.profile.minScore))
        : scored

    log.info(`Scored ${articles.length} articles, ${kept.length} after filtering`, { minScore: this.profile.minScore })

    return rankArticles(kept)
  }
}

import { z } from 'zod'
import { HN_ITEM_BASE_URL } from './constants.js'

// Constants

export const STORY_TYPES = ['top', 'new', 'best', 'ask', 'show', 'job'] as const

export const EXTRACTION_STATUS = {
  success: 'success',
  skipped: 'skipped',
  failed: 'failed',
  paywalled: 'paywalled',
  no_url: 'no_url',
  empty: 'empty'
} as const

export const SUMMARIZATION_STATUS = {
  success: 'success',
  no_content: 'no_content',
  api_error: 'api_error',
  parse_error: 'parse_error',
  cached: 'cached'
} as const

// Schemas

// Raw HN items carry more fields than we use (kids, parts, poll). Unknown keys are stripped.
export const StorySchema = z.object({
  id: z.number().int(),
  title: z.string().trim(),
  url: z.string().trim().optional(),
  score: z.number().int().min(0),
  by: z.string().trim(),
  time: z.number().int(),
  descendants: z.number().int().min(0).optional(),
  type: z.string().default('story'),
  kids: z.array(z.number().int()).default([]),
  text: z.string().trim().optional(),
  dead: z.boolean().optional(),
  deleted: z.boolean().optional()
})

export const ArticleSummarySchema = z
  .object({
    summary: z.string().trim().min(20).max(500),
    key_points: z
      .array(z.string())
      .transform(points => points.map(point => point.trim()).filter(point => point.length > 0))
      .pipe(z.array(z.string()).min(1, 'key_points must contain at least 1 non-empty item').max(5)),
    tech_tags: z
      .array(z.string())
      .default([])
      .transform(tags => tags.map(tag => tag.trim().toLowerCase()).filter(tag => tag.length > 0))
      .pipe(z.array(z.string()).max(10))
  })
  .transform(raw => ({
    summary: raw.summary,
    keyPoints: raw.key_points,
    techTags: raw.tech_tags
  }))

// Types

export type StoryType = (typeof STORY_TYPES)[number]

export type Story = Readonly<z.infer<typeof StorySchema>>

export type ExtractionStatus = (typeof EXTRACTION_STATUS)[keyof typeof EXTRACTION_STATUS]

export type SummarizationStatus = (typeof SUMMARIZATION_STATUS)[keyof typeof SUMMARIZATION_STATUS]

export type ArticleSummary = Readonly<z.output<typeof ArticleSummarySchema>>

export interface ExtractedArticle {
  readonly storyId: number
  readonly title: string
  readonly url: string | null
  readonly hnUrl: string
  readonly hnScore: number
  readonly hnComments: number
  readonly author: string
  readonly content: string | null
  readonly wordCount: number
  readonly status: ExtractionStatus
  readonly errorMessage: string | null
  readonly domain: string | null
  readonly hnText: string | null
}

export type SummarizedArticle =
  | {
      readonly article: ExtractedArticle
      readonly status: 'success' | 'cached'
      readonly summary: ArticleSummary
      readonly errorMessage: null
    }
  | {
      readonly article: ExtractedArticle
      readonly status: 'no_content' | 'api_error' | 'parse_error'
      readonly summary: null
      readonly errorMessage: string | null
    }

export interface RelevanceScore {
  readonly score: number
  readonly reason: string
  readonly matchedInterestTags: readonly string[]
  readonly matchedDisinterestTags: readonly string[]
}

export interface ScoredArticle {
  readonly article: SummarizedArticle
  readonly relevance: RelevanceScore
  readonly popularityScore: number
  readonly finalScore: number
  readonly storyId: number
  readonly title: string
  readonly relevanceScore: number
  readonly relevanceReason: string
}

export interface DigestStats {
  readonly fetched: number
  readonly filtered: number
  readonly final: number
  readonly errors: number
  readonly generationTimeMs: number
}

export interface Digest {
  readonly articles: readonly ScoredArticle[]
  readonly timestamp: string
  readonly stats: DigestStats
}

// Helpers

export function storyEndpoint(type: StoryType): string {
  return `/${type}stories.json`
}

export function hnItemUrl(id: number): string {
  return `${HN_ITEM_BASE_URL}?id=${id}`
}

export function hasContent(article: ExtractedArticle): boolean {
  return Boolean(article.content) || Boolean(article.hnText)
}

export function displayContent(article: ExtractedArticle): string | null {
  return article.content || article.hnText || null
}

export function hasSummary(article: SummarizedArticle): boolean {
  return article.summary !== null
}

export function displayTags(article: SummarizedArticle): readonly string[] {
  return article.summary?.techTags ?? []
}

// Only extracted articles reach the summarizer. Every other outcome is a dead end for this run.
export function isSummarizable(status: ExtractionStatus): boolean {
  switch (status) {
    case EXTRACTION_STATUS.success:
      return true
    case EXTRACTION_STATUS.skipped:
    case EXTRACTION_STATUS.failed:
    case EXTRACTION_STATUS.paywalled:
    case EXTRACTION_STATUS.no_url:
    case EXTRACTION_STATUS.empty:
      return false
    default: {
      const unreachable: never = status

      throw new Error(`Unknown extraction status: ${String(unreachable)}`)
    }
  }
}

export function createScoredArticle(
  article: SummarizedArticle,
  relevance: RelevanceScore,
  popularityScore: number,
  finalScore: number
): ScoredArticle {
  return {
    article,
    relevance,
    popularityScore,
    finalScore,
    storyId: article.article.storyId,
    title: article.article.title,
    relevanceScore: relevance.score,
    relevanceReason: relevance.reason
  }
}

export function isFiltered(article: ScoredArticle, minScore = 0): boolean {
  return article.finalScore < minScore
}

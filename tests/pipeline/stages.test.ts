import { describe, expect, it, vi } from 'vitest'
import type { ArticleSource } from '../../src/pipeline/articleExtractor.js'
import { createArticle } from '../../src/pipeline/articleExtractor.js'
import { ArticleScorer } from '../../src/pipeline/scoring.js'
import { fetchArticle, fetchArticles } from '../../src/pipeline/stages/fetchArticle.js'
import { fetchHn } from '../../src/pipeline/stages/fetchHn.js'
import { filterArticles, keepSummarizable } from '../../src/pipeline/stages/filter.js'
import { formatDigest } from '../../src/pipeline/stages/format.js'
import { rankArticles } from '../../src/pipeline/stages/rank.js'
import { scoreArticles } from '../../src/pipeline/stages/score.js'
import { summarizeArticles } from '../../src/pipeline/stages/summarize.js'
import type { PipelineState } from '../../src/pipeline/state.js'
import { initialState, mergeState } from '../../src/pipeline/state.js'
import type { ArticleSummarizer } from '../../src/pipeline/summarizer.js'
import type { StorySource } from '../../src/sources/hnClient.js'
import type { ExtractedArticle, Story } from '../../src/types.js'
import { makeArticle, makeProfile, makeStory, makeSummarized } from '../helpers.js'

function stateWith(update: Parameters<typeof mergeState>[1], profile = makeProfile()): PipelineState {
  return mergeState(initialState(profile, 0), update)
}

const succeed: ArticleSource = {
  extractOne: async (story: Story) =>
    createArticle(story, 'success', { content: `Content of ${story.id}`, wordCount: 3 })
}

describe('fetchHn', () => {
  it('passes the profile fetch settings to the source', async () => {
    const fetchStories = vi.fn<StorySource['fetchStories']>().mockResolvedValue([makeStory()])
    const profile = makeProfile({ fetchType: 'best', fetchCount: 12, minScore: 0.4 })

    const update = await fetchHn(initialState(profile, 0), { fetchStories }, () => 500)

    expect(fetchStories).toHaveBeenCalledWith('best', 12, 0)
    expect(update).toEqual({ stories: [makeStory()], startTime: 500 })
  })

  it('records an error when no stories come back', async () => {
    const update = await fetchHn(initialState(makeProfile(), 0), { fetchStories: async () => [] }, () => 1)

    expect(update).toEqual({ stories: [], errors: ['No stories found from HN API'], startTime: 1 })
  })

  it('lets source failures propagate', async () => {
    const source: StorySource = { fetchStories: vi.fn().mockRejectedValue(new Error('down')) }

    await expect(fetchHn(initialState(makeProfile(), 0), source, () => 1)).rejects.toThrow('down')
  })
})

describe('fetchArticle', () => {
  it('wraps the extracted article', async () => {
    const update = await fetchArticle(makeStory({ id: 4 }), succeed)

    expect(update.articles?.map(article => article.storyId)).toEqual([4])
    expect(update.errors).toBeUndefined()
  })

  it('converts an exception into a failed article and one error', async () => {
    const source: ArticleSource = { extractOne: vi.fn().mockRejectedValue(new Error('boom')) }

    const update = await fetchArticle(makeStory({ id: 4, title: 'Hello' }), source)

    expect(update.articles?.[0]).toMatchObject({ storyId: 4, status: 'failed', errorMessage: 'boom', content: null })
    expect(update.errors).toEqual(['Article 4 (Hello): boom'])
  })
})

describe('fetchArticles', () => {
  it('keeps every story when half the branches throw', async () => {
    const source: ArticleSource = {
      extractOne: async story => {
        if (story.id % 2 === 0) throw new Error(`branch ${story.id} failed`)

        return succeed.extractOne(story)
      }
    }
    const stories = Array.from({ length: 10 }, (_, index) => makeStory({ id: index + 1 }))

    const update = await fetchArticles(stateWith({ stories }), source, 3)

    expect(update.articles).toHaveLength(10)
    expect(update.articles?.map(article => article.storyId)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
    expect(update.articles?.filter(article => article.status === 'failed')).toHaveLength(5)
    expect(update.errors).toHaveLength(5)
    expect(update.errors?.[0]).toBe('Article 2 (Story 2): branch 2 failed')
  })

  it('runs at most maxConcurrent branches at once', async () => {
    let active = 0
    let peak = 0

    const source: ArticleSource = {
      extractOne: async story => {
        active += 1
        peak = Math.max(peak, active)

        await new Promise(resolve => setTimeout(resolve, 5))

        active -= 1

        return succeed.extractOne(story)
      }
    }
    const stories = Array.from({ length: 8 }, (_, index) => makeStory({ id: index + 1 }))

    const update = await fetchArticles(stateWith({ stories }), source, 3)

    expect(update.articles).toHaveLength(8)
    expect(peak).toBe(3)
  })

  it('returns an empty update without stories', async () => {
    await expect(fetchArticles(stateWith({}), succeed)).resolves.toEqual({})
  })
})

describe('filterArticles', () => {
  const articles: ExtractedArticle[] = [
    makeArticle({ storyId: 1 }),
    makeArticle({ storyId: 2, status: 'failed', content: null }),
    makeArticle({ storyId: 3, status: 'no_url', content: null, hnText: 'Ask HN: anything?' }),
    makeArticle({ storyId: 4, status: 'success', content: null, hnText: null }),
    makeArticle({ storyId: 5, status: 'skipped', content: null })
  ]

  it('keeps only extracted articles with content', () => {
    const update = filterArticles(stateWith({ articles }))

    expect(update.filteredArticles?.map(article => article.storyId)).toEqual([1])
  })

  it('is idempotent', () => {
    const once = keepSummarizable(articles)

    expect(keepSummarizable(once)).toEqual(once)
  })
})

describe('summarizeArticles', () => {
  it('records an error when nothing survived filtering', async () => {
    const summarizer: ArticleSummarizer = { summarizeBatch: vi.fn() }

    const update = await summarizeArticles(stateWith({}), summarizer)

    expect(update).toEqual({ summarizedArticles: [], errors: ['No articles to summarize after filtering'] })
    expect(summarizer.summarizeBatch).not.toHaveBeenCalled()
  })

  it('records one error per failed summary', async () => {
    const filteredArticles = [makeArticle({ storyId: 1 }), makeArticle({ storyId: 2, title: 'Broken' })]
    const summarizer: ArticleSummarizer = {
      summarizeBatch: async () => [
        makeSummarized(['go'], { storyId: 1 }),
        { article: filteredArticles[1], status: 'parse_error', summary: null, errorMessage: 'bad json' }
      ]
    }

    const update = await summarizeArticles(stateWith({ filteredArticles }), summarizer)

    expect(update.summarizedArticles).toHaveLength(2)
    expect(update.errors).toEqual(['Article 2 (Broken): bad json'])
  })
})

describe('formatDigest', () => {
  it('caps the digest at maxArticles and reports stats', () => {
    const scorer = new ArticleScorer(makeProfile())
    const rankedArticles = Array.from({ length: 20 }, (_, index) =>
      scorer.scoreArticle(makeSummarized([], { storyId: index + 1 }))
    )
    const state = stateWith(
      {
        stories: Array.from({ length: 25 }, (_, index) => makeStory({ id: index + 1 })),
        filteredArticles: Array.from({ length: 20 }, (_, index) => makeArticle({ storyId: index + 1 })),
        rankedArticles,
        errors: ['one', 'two'],
        startTime: 1_000
      },
      makeProfile({ maxArticles: 5 })
    )

    const { digest } = formatDigest(state, () => 3_500)

    expect(digest?.articles.map(article => article.storyId)).toEqual([1, 2, 3, 4, 5])
    expect(digest?.timestamp).toBe('1970-01-01T00:00:03.500Z')
    expect(digest?.stats).toEqual({ fetched: 25, filtered: 20, final: 5, errors: 2, generationTimeMs: 2_500 })
  })

  it('keeps the highest-scoring articles after score and rank', () => {
    const profile = makeProfile({ interestTags: ['rust'], maxArticles: 5 })
    // Story n has n * 10 points; every third story matches the interest tag.
    const summarizedArticles = Array.from({ length: 20 }, (_, index) =>
      makeSummarized(index % 3 === 0 ? ['rust'] : ['go'], { storyId: index + 1, hnScore: (index + 1) * 10 })
    )

    let state = stateWith({ summarizedArticles }, profile)

    state = mergeState(state, scoreArticles(state))
    state = mergeState(state, rankArticles(state))

    const { digest } = formatDigest(state, () => 0)

    expect(digest?.articles.map(article => article.storyId)).toEqual([19, 16, 13, 10, 7])
    expect(digest?.articles.map(article => article.finalScore)).toEqual(
      [...(digest?.articles.map(article => article.finalScore) ?? [])].sort((a, b) => b - a)
    )
  })

  it('produces an empty digest when nothing was ranked', () => {
    const { digest } = formatDigest(stateWith({ startTime: 10 }), () => 10)

    expect(digest?.articles).toEqual([])
    expect(digest?.stats.final).toBe(0)
    expect(digest?.stats.generationTimeMs).toBe(0)
  })
})

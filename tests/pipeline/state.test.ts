import { describe, expect, it } from 'vitest'
import { initialState, mergeState, mergeUpdates } from '../../src/pipeline/state.js'
import { makeArticle, makeProfile, makeStory } from '../helpers.js'

describe('mergeState', () => {
  const state = initialState(makeProfile(), 1000)

  it('appends articles and errors', () => {
    const once = mergeState(state, { articles: [makeArticle({ storyId: 1 })], errors: ['first'] })
    const twice = mergeState(once, { articles: [makeArticle({ storyId: 2 })], errors: ['second'] })

    expect(twice.articles.map(article => article.storyId)).toEqual([1, 2])
    expect(twice.errors).toEqual(['first', 'second'])
  })

  it('replaces every other field', () => {
    const once = mergeState(state, { stories: [makeStory({ id: 1 })] })
    const twice = mergeState(once, { stories: [makeStory({ id: 2 })], startTime: 2000 })

    expect(twice.stories.map(story => story.id)).toEqual([2])
    expect(twice.startTime).toBe(2000)
  })

  it('leaves fields absent from the update untouched', () => {
    const seeded = mergeState(state, { errors: ['kept'], stories: [makeStory()] })

    const next = mergeState(seeded, { filteredArticles: [] })

    expect(next.errors).toEqual(['kept'])
    expect(next.stories).toHaveLength(1)
  })

  it('does not mutate the previous state', () => {
    mergeState(state, { errors: ['x'] })

    expect(state.errors).toEqual([])
  })
})

describe('mergeUpdates', () => {
  it('flattens branch contributions in order', () => {
    const merged = mergeUpdates([
      { articles: [makeArticle({ storyId: 1 })] },
      { articles: [makeArticle({ storyId: 2 })], errors: ['two'] },
      {}
    ])

    expect(merged.articles?.map(article => article.storyId)).toEqual([1, 2])
    expect(merged.errors).toEqual(['two'])
  })
})

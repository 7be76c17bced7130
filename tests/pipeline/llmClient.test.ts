import { APIConnectionError, InternalServerError, RateLimitError } from 'openai'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { parseConfig } from '../../src/config.js'
import { SummarizerApiError, SummarizerParseError, SummarizerRateLimitError } from '../../src/errors.js'
import { OpenAiSummaryBackend, parseBatchResponse, toSummarizerError } from '../../src/pipeline/llmClient.js'
import { buildBatchUserContent } from '../../src/pipeline/prompts.js'
import { makeArticle } from '../helpers.js'

describe('parseBatchResponse', () => {
  it('returns the summaries array', () => {
    const text = JSON.stringify({ summaries: [{ summary: 'a' }, { summary: 'b' }] })

    expect(parseBatchResponse(text, 2)).toEqual([{ summary: 'a' }, { summary: 'b' }])
  })

  it('strips markdown fences', () => {
    const text = '```json\n{"summaries": [{"summary": "fenced"}]}\n```'

    expect(parseBatchResponse(text, 1)).toEqual([{ summary: 'fenced' }])
  })

  it('extracts the object from surrounding prose', () => {
    const text = 'Here you go: {"summaries": []} Hope that helps.'

    expect(parseBatchResponse(text, 0)).toEqual([])
  })

  it('places entries by their 1-based index', () => {
    const text = JSON.stringify({ summaries: [{ index: 3 }, { index: 1 }] })

    expect(parseBatchResponse(text, 3)).toEqual([{ index: 1 }, undefined, { index: 3 }])
  })

  it('falls back to position when indexes are unusable', () => {
    const text = JSON.stringify({ summaries: [{ index: 1 }, { index: 1 }, { index: 7 }] })

    expect(parseBatchResponse(text, 2)).toEqual([{ index: 1 }, { index: 1 }])
  })

  it.each([
    ['an empty response', '', 'Failed to parse LLM response: Empty response'],
    ['invalid JSON', '{not json', 'Failed to parse LLM response: Invalid JSON: {not json'],
    ['a missing array', '{"items": []}', 'Failed to parse LLM response: Missing "summaries" array: {"items": []}']
  ])('throws SummarizerParseError for %s', (_, text, message) => {
    expect(() => parseBatchResponse(text, 1)).toThrow(SummarizerParseError)
    expect(() => parseBatchResponse(text, 1)).toThrow(message)
  })
})

describe('OpenAiSummaryBackend', () => {
  const settings = parseConfig({}).llm

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('refuses to start without an API key', () => {
    vi.stubEnv('OPENROUTER_API_KEY', '')

    expect(() => new OpenAiSummaryBackend(settings)).toThrow('Set OPENROUTER_API_KEY')
  })

  it('accepts a key from the environment', () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret')

    expect(() => new OpenAiSummaryBackend(settings)).not.toThrow()
  })
})

describe('toSummarizerError', () => {
  it('maps rate limits and reads Retry-After', () => {
    const error = toSummarizerError(new RateLimitError(429, undefined, 'Rate limited', { 'retry-after': '12' }))

    expect(error).toBeInstanceOf(SummarizerRateLimitError)
    expect(error instanceof SummarizerRateLimitError && error.retryAfterSeconds).toBe(12)
    expect(error.message).toBe('429 Rate limited')
  })

  it('maps other API errors with their status', () => {
    const error = toSummarizerError(new InternalServerError(500, undefined, 'boom', {}))

    expect(error).toBeInstanceOf(SummarizerApiError)
    expect(error instanceof SummarizerApiError && error.statusCode).toBe(500)
  })

  it('maps connection failures to an API error', () => {
    const error = toSummarizerError(new APIConnectionError({ message: 'socket hang up' }))

    expect(error).toBeInstanceOf(SummarizerApiError)
  })

  it('passes other errors through', () => {
    const original = new Error('other')

    expect(toSummarizerError(original)).toBe(original)
  })
})

describe('buildBatchUserContent', () => {
  it('numbers each article and includes its title and content', () => {
    const content = buildBatchUserContent([
      makeArticle({ storyId: 1, title: 'First', content: 'Alpha body.' }),
      makeArticle({ storyId: 2, title: 'Second', content: null, hnText: 'Beta self-text.' })
    ])

    expect(content).toContain('<article index="1">\nTitle: First\n\nAlpha body.\n</article>')
    expect(content).toContain('<article index="2">\nTitle: Second\n\nBeta self-text.\n</article>')
    expect(content).toContain('Summarize each of the 2 articles above.')
  })
})

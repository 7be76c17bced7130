import OpenAI, { APIConnectionError, APIError, RateLimitError } from 'openai'
import type { LlmSettings } from '../config.js'
import { errorMessage, SummarizerApiError, SummarizerParseError, SummarizerRateLimitError } from '../errors.js'
import type { ExtractedArticle } from '../types.js'
import { logger } from '../utils/logger.js'
import { withRetry } from '../utils/retry.js'
import { BATCH_RESPONSE_SCHEMA, buildBatchUserContent, SUMMARY_SYSTEM_INSTRUCTION } from './prompts.js'
import type { SummaryBackend } from './summarizer.js'

// Constants

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503])

const log = logger.child('llm')

// Types

export interface OpenAiSummaryBackendOptions extends LlmSettings {
  apiKey?: string
  minBackoffMs?: number
}

// Helpers

function getApiKey(): string {
  const key = process.env.OPENROUTER_API_KEY?.trim()

  if (!key) throw new Error('Set OPENROUTER_API_KEY')

  return key
}

function isRetryableApiError(error: unknown): boolean {
  if (error instanceof APIConnectionError) return true

  if (error instanceof APIError) return typeof error.status === 'number' && RETRYABLE_STATUS_CODES.has(error.status)

  return false
}

function retryAfterSeconds(error: RateLimitError): number | null {
  const raw = error.headers?.['retry-after']
  const seconds = raw ? Number(raw) : Number.NaN

  return Number.isFinite(seconds) ? seconds : null
}

export function toSummarizerError(error: unknown): Error {
  if (error instanceof RateLimitError) {
    return new SummarizerRateLimitError(error.message, retryAfterSeconds(error), { cause: error })
  }

  if (error instanceof APIError) {
    return new SummarizerApiError(error.message, error.status ?? 500, { cause: error })
  }

  return error instanceof Error ? error : new Error(String(error))
}

function previewOf(text: string): string {
  return text.slice(0, 200).replace(/\n/g, '\\n')
}

// Response Parsing

// Returns one slot per article. Entries that carry a usable `index` are placed by it; otherwise by position.
export function parseBatchResponse(text: string | null | undefined, count: number): unknown[] {
  if (!text?.trim()) {
    throw new SummarizerParseError('Empty response', text ?? '')
  }

  let cleaned = text.trim()

  // Model may return JSON wrapped in markdown. Strip fences and extract object for parsing.
  const fenceMatch = cleaned.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i)

  if (fenceMatch) {
    cleaned = fenceMatch[1].trim()
  }

  const start = cleaned.indexOf('{')
  const end = cleaned.lastIndexOf('}')

  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1)
  }

  let parsed: unknown

  try {
    parsed = JSON.parse(cleaned)
  } catch {
    throw new SummarizerParseError(`Invalid JSON: ${previewOf(text)}`, text)
  }

  const result = BATCH_RESPONSE_SCHEMA.safeParse(parsed)

  if (!result.success) {
    throw new SummarizerParseError(`Missing "summaries" array: ${previewOf(text)}`, text)
  }

  const entries = result.data.summaries
  const indexes = entries.map(entry =>
    entry && typeof entry === 'object' && 'index' in entry && typeof entry.index === 'number' ? entry.index : null
  )

  const indexed = indexes.every(index => index !== null && Number.isInteger(index) && index >= 1 && index <= count)

  if (!indexed || new Set(indexes).size !== indexes.length) return entries.slice(0, count)

  const slots: unknown[] = new Array(count).fill(undefined)

  entries.forEach((entry, position) => {
    slots[(indexes[position] ?? 0) - 1] = entry
  })

  return slots
}

// Main Class

export class OpenAiSummaryBackend implements SummaryBackend {
  private readonly client: OpenAI

  // Throws without an API key, so a misconfigured run fails before any fetching.
  constructor(private readonly options: OpenAiSummaryBackendOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? getApiKey(),
      baseURL: options.baseUrl,
      maxRetries: 0
    })
  }

  async summarize(articles: readonly ExtractedArticle[]): Promise<unknown[]> {
    const { client } = this

    let content: string | null | undefined

    try {
      const response = await withRetry(
        () =>
          client.chat.completions.create({
            model: this.options.model,
            temperature: this.options.temperature,
            max_tokens: this.options.maxTokens,
            messages: [
              { role: 'system', content: SUMMARY_SYSTEM_INSTRUCTION },
              { role: 'user', content: buildBatchUserContent(articles) }
            ],
            response_format: { type: 'json_object' }
          }),
        {
          isRetryableError: isRetryableApiError,
          minDelayMs: this.options.minBackoffMs,
          onRetry: (error, attempt, delayMs) =>
            log.warn(`LLM call failed, retrying in ${delayMs}ms`, { attempt, error: errorMessage(error) })
        }
      )

      content = response.choices[0]?.message?.content

      log.debug(`Summarized ${articles.length} articles`, { tokens: response.usage?.total_tokens })
    } catch (error) {
      throw toSummarizerError(error)
    }

    return parseBatchResponse(content, articles.length)
  }
}

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import {
  ARTICLE_FETCH_TIMEOUT_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_CONCURRENT,
  HN_API_BASE_URL,
  HN_API_TIMEOUT_MS,
  MAX_CONTENT_LENGTH
} from './constants.js'

// Constants

const CONFIG_FILENAME = 'config.json'

// Schema

const outputFormatEnum = z.enum(['md', 'json', 'both'])

export const ScoringSettingsSchema = z
  .object({
    relevanceWeight: z.number().min(0, 'scoring.relevanceWeight must be non-negative').optional().default(0.7),
    popularityWeight: z.number().min(0, 'scoring.popularityWeight must be non-negative').optional().default(0.3),
    maxHnScore: z.number().positive().optional().default(500)
  })
  .refine(data => data.relevanceWeight + data.popularityWeight <= 1, {
    message: 'scoring weights must not sum to more than 1.0',
    path: ['popularityWeight']
  })

export const ConfigSchema = z.object({
  // Validated separately by parseUserProfile so profile errors surface as their own kind.
  profile: z.unknown().optional(),
  hnApiBaseUrl: z.string().url().optional().default(HN_API_BASE_URL),
  hnApiTimeoutMs: z.number().int().positive().optional().default(HN_API_TIMEOUT_MS),
  articleFetchTimeoutMs: z.number().int().positive().optional().default(ARTICLE_FETCH_TIMEOUT_MS),
  maxContentLength: z.number().int().min(100).optional().default(MAX_CONTENT_LENGTH),
  maxConcurrentFetches: z.number().int().min(1).optional().default(DEFAULT_MAX_CONCURRENT),
  summaryBatchSize: z.number().int().min(1).optional().default(DEFAULT_BATCH_SIZE),
  summaryCache: z.enum(['memory', 'none']).optional().default('memory'),
  llm: z
    .object({
      model: z
        .string()
        .transform(s => s.trim())
        .pipe(z.string().min(1, "Config must have a non-empty string 'llm.model'"))
        .optional()
        .default('anthropic/claude-3.5-haiku'),
      baseUrl: z.string().url().optional().default('https://openrouter.ai/api/v1'),
      temperature: z.number().min(0).max(2).optional().default(0),
      maxTokens: z.number().int().positive().optional().default(8192)
    })
    .optional()
    .default({}),
  scoring: ScoringSettingsSchema.optional().default({}),
  outputFormat: outputFormatEnum.optional().default('json')
})

// Types

export type Config = z.infer<typeof ConfigSchema>

export type LlmSettings = Config['llm']

export type ScoringSettings = Config['scoring']

export type OutputFormat = Config['outputFormat']

// Helpers

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0]

  if (!issue) return error.message

  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

export function parseConfig(data: unknown): Config {
  const result = ConfigSchema.safeParse(data)

  if (!result.success) {
    throw new Error(`Invalid config: ${firstIssue(result.error)}`)
  }

  return result.data
}

// Main Function

// config.json is optional; every setting has a default. A present but broken file is an error.
export async function loadConfig(cwd = process.cwd()): Promise<Config> {
  const path = join(cwd, CONFIG_FILENAME)

  let raw: string | null = null

  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      const message = error instanceof Error ? error.message : String(error)

      throw new Error(`Config file unreadable (${path}): ${message}`)
    }
  }

  let data: unknown = {}

  if (raw !== null) {
    try {
      data = JSON.parse(raw)
    } catch {
      throw new Error(`Invalid JSON in config file: ${path}`)
    }
  }

  return parseConfig(data)
}

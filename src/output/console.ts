import { relative } from 'node:path'
import type { Config } from '../config.js'
import type { UserProfile } from '../profile.js'
import type { Digest } from '../types.js'
import { formatDurationMs, formatScore, formatThousands, pluralize } from '../utils/format.js'

// Constants

const DEFAULT_COLUMNS = 80

const SUMMARY_LABEL_WIDTH = 13

// Helpers

function modelShortName(modelId: string): string {
  const segments = modelId.split('/')

  return segments.length > 1 ? (segments[segments.length - 1] ?? modelId) : modelId
}

export function truncateLine(text: string, maxLength: number): string {
  const trimmed = text.trim()

  const ellipsis = '...'

  if (maxLength <= 0 || trimmed.length <= maxLength) return trimmed

  if (maxLength <= ellipsis.length) return ellipsis

  return `${trimmed.slice(0, maxLength - ellipsis.length)}${ellipsis}`
}

function padLabel(label: string): string {
  return label.padEnd(SUMMARY_LABEL_WIDTH)
}

function tagLine(tags: readonly string[]): string {
  return tags.length > 0 ? tags.join(', ') : '(none)'
}

// Main Functions

export function printConfigBanner(config: Config, profile: UserProfile): void {
  const minScore = profile.minScore > 0 ? `, min score ${formatScore(profile.minScore)}` : ''

  console.log('')
  console.log(`${padLabel('Stories:')}${profile.fetchCount} ${profile.fetchType}${minScore}`)
  console.log(`${padLabel('Interests:')}${tagLine(profile.interestTags)}`)
  console.log(`${padLabel('Avoiding:')}${tagLine(profile.disinterestTags)}`)
  console.log(`${padLabel('Model:')}${modelShortName(config.llm.model)}`)
  console.log(`${padLabel('Concurrency:')}${config.maxConcurrentFetches}`)
  console.log('')
}

export function printResultsSummary(digest: Digest, outputPaths: string[]): void {
  const { stats } = digest
  const cwd = process.cwd()
  const columns = process.stdout.columns ?? DEFAULT_COLUMNS

  if (digest.articles.length > 0) {
    console.log('Top articles:')

    digest.articles.forEach((article, index) => {
      const prefix = `  ${String(index + 1).padStart(2)}. [${formatScore(article.finalScore)}] `

      console.log(`${prefix}${truncateLine(article.title, Math.max(0, columns - prefix.length))}`)
    })

    console.log('')
  }

  console.log('Results:')
  console.log(`  ${padLabel('Fetched:')}${pluralize(stats.fetched, 'story', 'stories')}`)
  console.log(`  ${padLabel('Summarized:')}${pluralize(stats.filtered, 'article')}`)
  console.log(`  ${padLabel('In digest:')}${pluralize(stats.final, 'article')}`)

  if (stats.errors > 0) {
    console.log(`  ${padLabel('Errors:')}${formatThousands(stats.errors)}`)
  }

  console.log(`  ${padLabel('Duration:')}${formatDurationMs(stats.generationTimeMs)}`)

  if (outputPaths.length > 0) {
    console.log(`  ${padLabel('Output:')}${relative(cwd, outputPaths[0])}`)

    for (let index = 1; index < outputPaths.length; index++) {
      console.log(`  ${' '.repeat(SUMMARY_LABEL_WIDTH)}${relative(cwd, outputPaths[index])}`)
    }
  }
}

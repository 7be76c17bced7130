import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { OutputFormat } from '../config.js'
import type { UserProfile } from '../profile.js'
import type { Digest, ScoredArticle } from '../types.js'
import { formatDurationMs, formatScore, formatThousands } from '../utils/format.js'

// Constants

const DIGEST_JSON_FILENAME = 'digest.json'

const DIGEST_MD_FILENAME = 'digest.md'

// Types

export interface DigestOutputMetadata {
  model: string
}

export interface DigestArticleOutput {
  rank: number
  storyId: number
  title: string
  url: string | null
  hnUrl: string
  domain: string | null
  author: string
  hnScore: number
  hnComments: number
  summary?: string
  keyPoints?: string[]
  techTags: string[]
  relevanceScore: number
  relevanceReason: string
  popularityScore: number
  finalScore: number
}

export interface DigestOutput {
  metadata: {
    generatedAt: string
    fetchType: string
    interestTags: string[]
    disinterestTags: string[]
    minScore: number
    maxArticles: number
    model: string
  }
  stats: Digest['stats']
  articles: DigestArticleOutput[]
}

// Shared Helpers

function articleLink(article: ScoredArticle): string {
  return article.article.article.url ?? article.article.article.hnUrl
}

function tagList(tags: readonly string[]): string {
  return tags.length > 0 ? tags.join(', ') : 'none'
}

// Markdown Output

function buildDigestHeader(digest: Digest, profile: UserProfile, metadata: DigestOutputMetadata): string {
  const { stats } = digest

  return `# HN Digest

- **Generated:** ${digest.timestamp}
- **Stories:** ${profile.fetchType} (fetched ${formatThousands(stats.fetched)}, summarized ${formatThousands(stats.filtered)}, shown ${formatThousands(stats.final)})
- **Interests:** ${tagList(profile.interestTags)}
- **Avoiding:** ${tagList(profile.disinterestTags)}
- **Model:** ${metadata.model}
- **Duration:** ${formatDurationMs(stats.generationTimeMs)}
- **Errors:** ${formatThousands(stats.errors)}

---

`
}

function buildArticleMarkdown(scored: ScoredArticle, rank: number): string {
  const { article, summary } = scored.article
  const details = [
    article.domain,
    `${formatThousands(article.hnScore)} points`,
    `${formatThousands(article.hnComments)} comments`,
    `[discussion](${article.hnUrl})`
  ].filter(Boolean)

  const lines = [`## ${rank}. [${scored.title}](${articleLink(scored)})`, '', details.join(' · ')]

  if (summary) {
    lines.push('', summary.summary.replace(/\s+/g, ' '), '', ...summary.keyPoints.map(point => `- ${point}`))
  }

  const tags = summary && summary.techTags.length > 0 ? `**Tags:** ${summary.techTags.join(', ')} · ` : ''

  lines.push('', `${tags}**Score:** ${formatScore(scored.finalScore)} (${scored.relevanceReason})`)

  return lines.join('\n')
}

export function buildDigestMarkdown(digest: Digest, profile: UserProfile, metadata: DigestOutputMetadata): string {
  const header = buildDigestHeader(digest, profile, metadata)

  if (digest.articles.length === 0) return `${header}_No articles matched this run._\n`

  const body = digest.articles.map((article, index) => buildArticleMarkdown(article, index + 1)).join('\n\n')

  return `${header}${body}\n`
}

// JSON Output

export function buildDigestJson(digest: Digest, profile: UserProfile, metadata: DigestOutputMetadata): DigestOutput {
  return {
    metadata: {
      generatedAt: digest.timestamp,
      fetchType: profile.fetchType,
      interestTags: [...profile.interestTags],
      disinterestTags: [...profile.disinterestTags],
      minScore: profile.minScore,
      maxArticles: profile.maxArticles,
      model: metadata.model
    },
    stats: { ...digest.stats },
    articles: digest.articles.map((scored, index) => {
      const { article, summary } = scored.article

      return {
        rank: index + 1,
        storyId: article.storyId,
        title: article.title,
        url: article.url,
        hnUrl: article.hnUrl,
        domain: article.domain,
        author: article.author,
        hnScore: article.hnScore,
        hnComments: article.hnComments,
        ...(summary && { summary: summary.summary, keyPoints: [...summary.keyPoints] }),
        techTags: summary ? [...summary.techTags] : [],
        relevanceScore: scored.relevanceScore,
        relevanceReason: scored.relevanceReason,
        popularityScore: scored.popularityScore,
        finalScore: scored.finalScore
      }
    })
  }
}

// Public API

export async function writeOutput(
  digest: Digest,
  profile: UserProfile,
  options: { format: OutputFormat; runDir: string; metadata: DigestOutputMetadata }
): Promise<string[]> {
  const { format, runDir, metadata } = options
  const paths: string[] = []

  if (format === 'md' || format === 'both') {
    const mdPath = join(runDir, DIGEST_MD_FILENAME)

    await writeFile(mdPath, buildDigestMarkdown(digest, profile, metadata), 'utf8')

    paths.push(mdPath)
  }

  if (format === 'json' || format === 'both') {
    const jsonPath = join(runDir, DIGEST_JSON_FILENAME)

    await writeFile(jsonPath, JSON.stringify(buildDigestJson(digest, profile, metadata), null, 2), 'utf8')

    paths.push(jsonPath)
  }

  return paths
}

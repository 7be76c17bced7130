import { z } from 'zod'
import type { ExtractedArticle } from '../types.js'
import { displayContent } from '../types.js'

// One call summarizes a whole chunk. Entries must come back in the order the articles were given.
export const SUMMARY_SYSTEM_INSTRUCTION = `<role>
You are a technical content summarizer for HackerNews articles. Your job is to condense each article into a short summary, its key takeaways and its technology tags.
</role>

<constraints>
- Summarize each article independently. Never mix facts from one article into another.
- Write a concise 2-3 sentence summary capturing the main points. Stay between 20 and 500 characters.
- Extract 1-5 key takeaways as short, self-contained statements. Prefer exactly 3.
- Identify up to 10 relevant technology or topic tags (e.g. python, ai, security, devops). Use short lowercase names.
- Accept all factual claims at face value. Never question them based on your own knowledge; your training data may be outdated.
- Return exactly one entry per article, in the same order as the articles are numbered.
</constraints>

<output_format>
Return your response as JSON with these exact fields:
{
  "summaries": [
    {
      "index": number,
      "summary": "2-3 sentence summary",
      "key_points": ["takeaway", "takeaway", "takeaway"],
      "tech_tags": ["tag", "tag"]
    }
  ]
}
</output_format>`

// Entries are validated one by one later, so a single bad entry does not sink the chunk.
export const BATCH_RESPONSE_SCHEMA = z.object({
  summaries: z.array(z.unknown())
})

export function buildBatchUserContent(articles: readonly ExtractedArticle[]): string {
  const sections = articles.map(
    (article, index) => `<article index="${index + 1}">
Title: ${article.title}

${displayContent(article) ?? ''}
</article>`
  )

  return `<context>
${sections.join('\n\n')}
</context>

<task>
Summarize each of the ${articles.length} article${articles.length === 1 ? '' : 's'} above.
</task>`
}

import { z } from 'zod'
import { ProfileValidationError } from './errors.js'
import { STORY_TYPES } from './types.js'

// Constants

const MAX_TAGS = 50

// Helpers

// Lowercase, drop blanks, dedupe keeping first occurrence.
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>()
  const result: string[] = []

  for (const tag of tags) {
    const normalized = tag.trim().toLowerCase()

    if (!normalized || seen.has(normalized)) continue

    seen.add(normalized)
    result.push(normalized)
  }

  return result
}

const tagListSchema = z
  .array(z.string())
  .default([])
  .transform(normalizeTags)
  .pipe(z.array(z.string()).max(MAX_TAGS, `At most ${MAX_TAGS} tags are allowed`))

// Schema

export const UserProfileSchema = z
  .object({
    interestTags: tagListSchema,
    disinterestTags: tagListSchema,
    minScore: z.number().min(0).max(1).default(0),
    maxArticles: z.number().int().min(1).max(100).default(10),
    fetchType: z.enum(STORY_TYPES).default('top'),
    fetchCount: z.number().int().min(1).max(100).default(30)
  })
  .superRefine((profile, ctx) => {
    const disinterest = new Set(profile.disinterestTags)
    const overlap = profile.interestTags.filter(tag => disinterest.has(tag)).sort()

    if (overlap.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Tags cannot be in both interest and disinterest lists: ${overlap.join(', ')}`,
        path: ['disinterestTags']
      })
    }
  })

// Types

export type UserProfile = Readonly<z.output<typeof UserProfileSchema>>

export type UserProfileInput = z.input<typeof UserProfileSchema>

// Main Functions

export function parseUserProfile(input: unknown): UserProfile {
  const result = UserProfileSchema.safeParse(input ?? {})

  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )

    throw new ProfileValidationError(issues)
  }

  return result.data
}

export function hasPreferences(profile: UserProfile): boolean {
  return profile.interestTags.length > 0 || profile.disinterestTags.length > 0
}

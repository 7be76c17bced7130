export const ARTICLE_FETCH_TIMEOUT_MS = 15_000

export const DEFAULT_BATCH_SIZE = 5

export const DEFAULT_MAX_CONCURRENT = 10

export const HN_API_BASE_URL = 'https://hacker-news.firebaseio.com/v0'

export const HN_API_TIMEOUT_MS = 30_000

export const HN_ITEM_BASE_URL = 'https://news.ycombinator.com/item'

export const MAX_ATTEMPTS = 3

export const MAX_BACKOFF_MS = 10_000

export const MAX_CONTENT_LENGTH = 8_000

export const MIN_BACKOFF_MS = 1_000

export const MIN_READABLE_LENGTH = 100

export const OUTPUT_DIR = 'output'

export const USER_AGENT = 'hn-digest/0.1 (+https://news.ycombinator.com)'

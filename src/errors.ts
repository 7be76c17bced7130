// HN source

export class HnClientError extends Error {
  readonly retryable: boolean = false

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)

    this.name = new.target.name
  }
}

export class HnTimeoutError extends HnClientError {
  override readonly retryable = true
}

export class HnTransportError extends HnClientError {
  override readonly retryable = true
}

export class HnApiError extends HnClientError {
  constructor(
    readonly statusCode: number,
    message: string,
    options?: ErrorOptions
  ) {
    super(`HN API error ${statusCode}: ${message}`, options)
  }
}

// Summarizer backend

export class SummarizerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)

    this.name = new.target.name
  }
}

export class SummarizerRateLimitError extends SummarizerError {
  constructor(
    message: string,
    readonly retryAfterSeconds: number | null = null,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class SummarizerApiError extends SummarizerError {
  constructor(
    message: string,
    readonly statusCode: number,
    options?: ErrorOptions
  ) {
    super(`LLM API error (HTTP ${statusCode}): ${message}`, options)
  }
}

export class SummarizerParseError extends SummarizerError {
  constructor(
    message: string,
    readonly rawOutput: string,
    options?: ErrorOptions
  ) {
    super(`Failed to parse LLM response: ${message}`, options)
  }
}

// Pipeline

export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)

    this.name = new.target.name
  }

  override toString(): string {
    if (this.cause instanceof Error) return `${this.name}: ${this.message} (caused by: ${this.cause.message})`

    return `${this.name}: ${this.message}`
  }
}

// The story source could not be reached at all. Distinct from a generic run failure.
export class SourceUnavailableError extends PipelineError {}

// Configuration and validation

export class ProfileValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid profile: ${issues.join('; ')}`)

    this.name = 'ProfileValidationError'
  }
}

export class ScoringConfigError extends Error {
  constructor(message: string) {
    super(message)

    this.name = 'ScoringConfigError'
  }
}

export class ScopeError extends Error {
  constructor(resource: string) {
    super(`${resource} must be opened before use`)

    this.name = 'ScopeError'
  }
}

// Helpers

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

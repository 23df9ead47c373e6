/**
 * LLM Plumbing — Error Classes
 *
 * Typed errors raised by providers and by response parsing. The
 * classification client treats every LlmError as a retryable attempt failure.
 */

export class LlmError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'LlmError'
    this.code = code
    this.details = details
  }
}

export class MissingApiKeyError extends LlmError {
  constructor(provider: string) {
    super(
      'MISSING_API_KEY',
      `API key not configured for provider "${provider}". Set the corresponding environment variable.`,
      { provider }
    )
    this.name = 'MissingApiKeyError'
  }
}

export class LlmProviderError extends LlmError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super('LLM_PROVIDER_ERROR', `${provider}: ${message}`, { provider, ...details })
    this.name = 'LlmProviderError'
  }
}

export class LlmBadOutputError extends LlmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('LLM_BAD_OUTPUT', message, details)
    this.name = 'LlmBadOutputError'
  }
}

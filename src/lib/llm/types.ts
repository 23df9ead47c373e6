/**
 * LLM Plumbing — Type Definitions
 *
 * Provider abstraction for OpenAI / Anthropic API calls.
 */

export type ProviderId = 'openai' | 'anthropic'

export type LlmMode = 'dry_run' | 'real'

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface LlmRequest {
  provider: ProviderId
  model: string
  system?: string
  messages: LlmMessage[]
  maxTokens?: number
  temperature?: number
  /** Ask the provider for a JSON object body where it supports it */
  jsonOutput?: boolean
  metadata?: Record<string, unknown>
}

export interface LlmResponse {
  text: string
  tokensIn: number
  tokensOut: number
  dryRun: boolean
  raw?: unknown
}

/** Anything that can answer an LlmRequest; callLlm is the production one. */
export type LlmCaller = (req: LlmRequest) => Promise<LlmResponse>

/**
 * LLM Plumbing — Configuration
 *
 * Reads env vars for LLM provider configuration.
 * Never logs secrets.
 */

import type { ProviderId, LlmMode } from './types'
import { MissingApiKeyError } from './errors'

const ENV_KEYS: Record<ProviderId, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
}

const DEFAULT_MODEL = 'gpt-4o-mini'
const DEFAULT_MAX_TOKENS = 500
const DEFAULT_TEMPERATURE = 0.1

/**
 * Returns the current LLM mode.
 * Defaults to 'dry_run' when LLM_MODE is unset or invalid.
 */
export function getLlmMode(): LlmMode {
  const raw = process.env.LLM_MODE?.trim().toLowerCase()
  if (raw === 'real') return 'real'
  return 'dry_run'
}

/**
 * Returns the provider from env. Defaults to 'openai'.
 */
export function getProvider(): ProviderId {
  const raw = process.env.LLM_PROVIDER?.trim().toLowerCase()
  if (raw === 'anthropic') return 'anthropic'
  return 'openai'
}

export function getModel(): string {
  return process.env.LLM_MODEL?.trim() || DEFAULT_MODEL
}

/**
 * Returns the API key for a provider.
 * Throws MissingApiKeyError if not set.
 */
export function getApiKey(provider: ProviderId): string {
  const envVar = ENV_KEYS[provider]
  const key = process.env[envVar]?.trim()
  if (!key) {
    throw new MissingApiKeyError(provider)
  }
  return key
}

/**
 * Validates that the API key is available for the given provider.
 * Only enforced in real mode — dry_run never needs keys.
 */
export function requireApiKeyForRealMode(provider: ProviderId): void {
  if (getLlmMode() === 'real') {
    getApiKey(provider) // throws if missing
  }
}

/**
 * Max output tokens per classification call. Defaults to 500.
 */
export function getMaxTokens(): number {
  const raw = process.env.LLM_MAX_TOKENS?.trim()
  if (raw) {
    const parsed = parseInt(raw, 10)
    if (!isNaN(parsed) && parsed > 0) return parsed
  }
  return DEFAULT_MAX_TOKENS
}

export function getTemperature(): number {
  const raw = process.env.LLM_TEMPERATURE?.trim()
  if (raw) {
    const parsed = parseFloat(raw)
    if (!isNaN(parsed) && parsed >= 0 && parsed <= 2) return parsed
  }
  return DEFAULT_TEMPERATURE
}

/**
 * LLM Plumbing — Public API
 *
 * Re-exports for consumers.
 */

export { callLlm, estimateTokens, dryRunLabelFor } from './client'
export {
  getLlmMode,
  getProvider,
  getModel,
  getApiKey,
  requireApiKeyForRealMode,
  getMaxTokens,
  getTemperature,
} from './config'
export { RateGovernor, realClock } from './rateGovernor'
export type { Clock, RateGovernorOptions, Reservation } from './rateGovernor'
export { LlmError, MissingApiKeyError, LlmProviderError, LlmBadOutputError } from './errors'
export type { ProviderId, LlmMode, LlmMessage, LlmRequest, LlmResponse, LlmCaller } from './types'

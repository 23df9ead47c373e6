/**
 * LLM Plumbing — Client
 *
 * Single exported function: callLlm(req)
 *
 * - DRY_RUN mode answers classify requests with deterministic labels.
 * - REAL mode calls OpenAI or Anthropic via provider modules.
 */

import type { LlmRequest, LlmResponse } from './types'
import { getLlmMode, getApiKey } from './config'
import { callOpenAi } from './providers/openai'
import { callAnthropic } from './providers/anthropic'
import { sha256, hashToUint32 } from '../hash'
import { LABEL_VALUES } from '../labels'
import { InvalidInputError } from '../errors'

/**
 * Estimates token count from text (chars / 4 heuristic).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

/**
 * Builds a combined input string from the request for token estimation.
 */
function buildInputText(req: LlmRequest): string {
  const parts: string[] = []
  if (req.system) parts.push(req.system)
  for (const msg of req.messages) {
    parts.push(`${msg.role}: ${msg.content}`)
  }
  return parts.join('\n')
}

function readRecordKeys(metadata: Record<string, unknown> | undefined): string[] | undefined {
  const keys = metadata?.recordKeys
  if (!Array.isArray(keys)) return undefined
  return keys.filter((key): key is string => typeof key === 'string')
}

/**
 * Picks a label for a record key: uint32(sha256(key)[0..3]) % |labels|.
 */
export function dryRunLabelFor(recordKey: string) {
  const index = hashToUint32(sha256(recordKey)) % LABEL_VALUES.length
  return LABEL_VALUES[index]
}

/**
 * Dry-run response for the classify stage: one prediction per record key
 * passed via metadata, in the same JSON shape a real model is asked for.
 *
 * @throws InvalidInputError for any other request
 */
function dryRunResponse(req: LlmRequest): LlmResponse {
  const recordKeys = readRecordKeys(req.metadata)
  if (req.metadata?.stage !== 'classify' || !recordKeys) {
    throw new InvalidInputError('Dry-run mode only answers classify requests carrying metadata.recordKeys', {
      stage: req.metadata?.stage,
    })
  }

  const tokensIn = estimateTokens(buildInputText(req))
  const text = JSON.stringify({
    predictions: recordKeys.map((key, index) => ({ index, label: dryRunLabelFor(key) })),
  })

  return { text, tokensIn, tokensOut: estimateTokens(text), dryRun: true }
}

/**
 * Calls an LLM provider or returns a dry-run response.
 *
 * Real mode routes to the appropriate provider SDK and returns the
 * provider's token counts.
 *
 * @throws InvalidInputError in dry-run mode for a request without record keys
 * @throws MissingApiKeyError in real mode when the provider key is unset
 * @throws LlmProviderError on SDK/network errors
 */
export async function callLlm(req: LlmRequest): Promise<LlmResponse> {
  if (getLlmMode() === 'dry_run') {
    return dryRunResponse(req)
  }

  const apiKey = getApiKey(req.provider)

  const result = req.provider === 'anthropic'
    ? await callAnthropic(req, apiKey)
    : await callOpenAi(req, apiKey)

  return {
    text: result.text,
    tokensIn: result.tokensIn,
    tokensOut: result.tokensOut,
    dryRun: false,
    raw: result.raw,
  }
}

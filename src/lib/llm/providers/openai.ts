/**
 * OpenAI Provider — Responses API wrapper
 *
 * Thin adapter: takes an LlmRequest, calls the OpenAI Responses API,
 * and returns { text, tokensIn, tokensOut, raw }.
 *
 * Never logs secrets or full prompts.
 */

import OpenAI from 'openai'
import type { LlmRequest } from '../types'
import { LlmProviderError } from '../errors'

export interface ProviderResult {
  text: string
  tokensIn: number
  tokensOut: number
  raw: unknown
}

/**
 * Calls the OpenAI Responses API.
 *
 * JSON output mode is requested via `text.format` when req.jsonOutput is set;
 * the API then guarantees a syntactically valid JSON object body.
 *
 * @throws LlmProviderError on SDK/network errors
 */
export async function callOpenAi(req: LlmRequest, apiKey: string): Promise<ProviderResult> {
  const client = new OpenAI({ apiKey })

  try {
    const response = await client.responses.create({
      model: req.model,
      instructions: req.system ?? undefined,
      input: req.messages.map((m) => ({
        role: m.role === 'system' ? ('developer' as const) : m.role,
        content: m.content,
      })),
      ...(req.jsonOutput && { text: { format: { type: 'json_object' as const } } }),
      ...(req.temperature !== undefined && { temperature: req.temperature }),
      ...(req.maxTokens !== undefined && { max_output_tokens: req.maxTokens }),
    })

    const text = response.output_text ?? ''
    const tokensIn = response.usage?.input_tokens ?? 0
    const tokensOut = response.usage?.output_tokens ?? 0

    return { text, tokensIn, tokensOut, raw: response }
  } catch (err) {
    if (OpenAI.APIError && err instanceof OpenAI.APIError) {
      throw new LlmProviderError('openai', err.message, {
        status: err.status,
        name: err.name,
      })
    }
    throw new LlmProviderError(
      'openai',
      err instanceof Error ? err.message : String(err)
    )
  }
}

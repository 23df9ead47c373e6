/**
 * Anthropic Provider — Messages API wrapper
 *
 * Thin adapter: takes an LlmRequest, calls the Anthropic Messages API,
 * and returns { text, tokensIn, tokensOut, raw }.
 *
 * The Messages API has no JSON output switch; the classify prompt asks for
 * JSON and the response parser extracts it from the text.
 */

import Anthropic from '@anthropic-ai/sdk'
import type { LlmMessage, LlmRequest } from '../types'
import { LlmProviderError } from '../errors'
import type { ProviderResult } from './openai'

/**
 * Calls the Anthropic Messages API.
 *
 * @throws LlmProviderError on SDK/network errors
 */
export async function callAnthropic(req: LlmRequest, apiKey: string): Promise<ProviderResult> {
  const client = new Anthropic({ apiKey })

  try {
    const message = await client.messages.create({
      model: req.model,
      max_tokens: req.maxTokens ?? 1024,
      messages: req.messages
        .filter((m): m is LlmMessage & { role: 'user' | 'assistant' } => m.role !== 'system')
        .map((m) => ({
          role: m.role,
          content: m.content,
        })),
      ...(req.system && { system: req.system }),
      ...(req.temperature !== undefined && { temperature: req.temperature }),
    })

    // Extract text from content blocks
    const text = message.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n')

    return {
      text,
      tokensIn: message.usage.input_tokens,
      tokensOut: message.usage.output_tokens,
      raw: message,
    }
  } catch (err) {
    if (Anthropic.APIError && err instanceof Anthropic.APIError) {
      throw new LlmProviderError('anthropic', err.message, {
        status: err.status,
        name: err.name,
      })
    }
    throw new LlmProviderError(
      'anthropic',
      err instanceof Error ? err.message : String(err)
    )
  }
}

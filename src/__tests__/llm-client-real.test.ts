/**
 * Tests for callLlm() in real mode with mocked provider modules.
 *
 * Covers API key validation and provider dispatch without network calls.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { LlmRequest } from '../lib/llm/types'
import { MissingApiKeyError, LlmProviderError } from '../lib/llm/errors'

// Mock provider modules to prevent network calls
vi.mock('../lib/llm/providers/openai', () => ({
  callOpenAi: vi.fn(),
}))
vi.mock('../lib/llm/providers/anthropic', () => ({
  callAnthropic: vi.fn(),
}))

import { callLlm } from '../lib/llm/client'
import { callOpenAi } from '../lib/llm/providers/openai'
import { callAnthropic } from '../lib/llm/providers/anthropic'

const mockedCallOpenAi = vi.mocked(callOpenAi)
const mockedCallAnthropic = vi.mocked(callAnthropic)

const CLASSIFY_TEXT = '{"predictions":[{"index":0,"label":"Christian"}]}'

describe('callLlm real mode', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    vi.clearAllMocks()
    process.env.LLM_MODE = 'real'
    delete process.env.OPENAI_API_KEY
    delete process.env.ANTHROPIC_API_KEY
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  describe('OpenAI routing', () => {
    const openaiReq: LlmRequest = {
      provider: 'openai',
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Classify these voters:\n\n0. Name: Mary George' }],
      system: 'You classify voters.',
      temperature: 0.1,
      jsonOutput: true,
      metadata: { stage: 'classify', recordKeys: ['k0'] },
    }

    it('throws MissingApiKeyError without OPENAI_API_KEY', async () => {
      await expect(callLlm(openaiReq)).rejects.toThrow(MissingApiKeyError)
      expect(mockedCallOpenAi).not.toHaveBeenCalled()
    })

    it('calls callOpenAi with the request and key', async () => {
      process.env.OPENAI_API_KEY = 'test-secret'
      mockedCallOpenAi.mockResolvedValue({
        text: CLASSIFY_TEXT,
        tokensIn: 100,
        tokensOut: 20,
        raw: { id: 'resp_1' },
      })

      const resp = await callLlm(openaiReq)

      expect(mockedCallOpenAi).toHaveBeenCalledWith(openaiReq, 'test-secret')
      expect(mockedCallAnthropic).not.toHaveBeenCalled()
      expect(resp).toEqual({
        text: CLASSIFY_TEXT,
        tokensIn: 100,
        tokensOut: 20,
        dryRun: false,
        raw: { id: 'resp_1' },
      })
    })

    it('propagates LlmProviderError from provider', async () => {
      process.env.OPENAI_API_KEY = 'test-secret'
      mockedCallOpenAi.mockRejectedValue(
        new LlmProviderError('openai', 'rate limit exceeded', { status: 429 })
      )

      await expect(callLlm(openaiReq)).rejects.toThrow(LlmProviderError)
    })
  })

  describe('Anthropic routing', () => {
    const anthropicReq: LlmRequest = {
      provider: 'anthropic',
      model: 'claude-sonnet-4-5',
      messages: [{ role: 'user', content: 'Classify these voters:\n\n0. Name: Mary George' }],
      system: 'You classify voters.',
      temperature: 0.1,
      metadata: { stage: 'classify', recordKeys: ['k0'] },
    }

    it('throws MissingApiKeyError without ANTHROPIC_API_KEY', async () => {
      process.env.OPENAI_API_KEY = 'test-secret'
      await expect(callLlm(anthropicReq)).rejects.toThrow(MissingApiKeyError)
    })

    it('calls callAnthropic with the request and key', async () => {
      process.env.ANTHROPIC_API_KEY = 'test-secret'
      mockedCallAnthropic.mockResolvedValue({
        text: CLASSIFY_TEXT,
        tokensIn: 80,
        tokensOut: 15,
        raw: { id: 'msg_1' },
      })

      const resp = await callLlm(anthropicReq)

      expect(mockedCallAnthropic).toHaveBeenCalledWith(anthropicReq, 'test-secret')
      expect(mockedCallOpenAi).not.toHaveBeenCalled()
      expect(resp.text).toBe(CLASSIFY_TEXT)
      expect(resp.tokensIn).toBe(80)
      expect(resp.tokensOut).toBe(15)
      expect(resp.dryRun).toBe(false)
    })

    it('propagates LlmProviderError from provider', async () => {
      process.env.ANTHROPIC_API_KEY = 'test-secret'
      mockedCallAnthropic.mockRejectedValue(
        new LlmProviderError('anthropic', 'overloaded', { status: 529 })
      )

      await expect(callLlm(anthropicReq)).rejects.toThrow(LlmProviderError)
    })
  })

  describe('dry_run mode is unaffected', () => {
    it('never calls a provider', async () => {
      delete process.env.LLM_MODE
      const resp = await callLlm({
        provider: 'openai',
        model: 'gpt-4o-mini',
        messages: [{ role: 'user', content: 'Hello' }],
        metadata: { stage: 'classify', recordKeys: ['k0', 'k1'] },
      })

      expect(resp.dryRun).toBe(true)
      expect(JSON.parse(resp.text).predictions).toHaveLength(2)
      expect(mockedCallOpenAi).not.toHaveBeenCalled()
      expect(mockedCallAnthropic).not.toHaveBeenCalled()
    })
  })
})

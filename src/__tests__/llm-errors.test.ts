import { describe, it, expect } from 'vitest'
import {
  LlmError,
  MissingApiKeyError,
  LlmProviderError,
  LlmBadOutputError,
} from '../lib/llm/errors'

describe('LLM error classes', () => {
  describe('LlmError', () => {
    it('has code and message', () => {
      const err = new LlmError('TEST_CODE', 'test message')
      expect(err.code).toBe('TEST_CODE')
      expect(err.message).toBe('test message')
      expect(err.details).toBeUndefined()
      expect(err).toBeInstanceOf(Error)
    })
  })

  describe('MissingApiKeyError', () => {
    it('has code MISSING_API_KEY and the provider in details', () => {
      const err = new MissingApiKeyError('anthropic')
      expect(err.code).toBe('MISSING_API_KEY')
      expect(err.details).toEqual({ provider: 'anthropic' })
      expect(err.message).toContain('anthropic')
      expect(err).toBeInstanceOf(LlmError)
    })
  })

  describe('LlmProviderError', () => {
    it('prefixes the message with the provider', () => {
      const err = new LlmProviderError('openai', 'rate limit exceeded', { status: 429 })
      expect(err.code).toBe('LLM_PROVIDER_ERROR')
      expect(err.message).toBe('openai: rate limit exceeded')
      expect(err.details).toEqual({ provider: 'openai', status: 429 })
      expect(err.name).toBe('LlmProviderError')
      expect(err).toBeInstanceOf(LlmError)
    })
  })

  describe('LlmBadOutputError', () => {
    it('has code LLM_BAD_OUTPUT', () => {
      const err = new LlmBadOutputError('LLM output is not valid JSON', { candidatesTried: 1 })
      expect(err.code).toBe('LLM_BAD_OUTPUT')
      expect(err.details).toEqual({ candidatesTried: 1 })
      expect(err).toBeInstanceOf(LlmError)
    })
  })
})

/**
 * Segment 15: LLM Client Tests
 *
 * Model fallback only; nothing here reaches the network.
 */

import { describe, it, expect } from 'vitest'
import { completeWithFallback, createGroqLlmClient } from '../src/llm-client'
import { DEFAULT_GROQ_BASE_URL, SUBSTITUTE_MODELS } from '../src/config'

function attempts(succeedOn: string | null) {
  const tried: string[] = []
  const attempt = async (model: string) => {
    tried.push(model)
    if (model === succeedOn) return `reply from ${model}`
    throw new Error(`${model} unavailable`)
  }
  return { tried, attempt }
}

describe('Segment 15: LLM Client', () => {
  describe('completeWithFallback', () => {
    it('uses the primary model when it answers', async () => {
      const { tried, attempt } = attempts('primary')
      expect(await completeWithFallback('primary', ['backup'], attempt)).toBe('reply from primary')
      expect(tried).toEqual(['primary'])
    })

    it('tries substitutes in order, skipping the primary', async () => {
      const { tried, attempt } = attempts('small')
      const result = await completeWithFallback('primary', ['primary', 'large', 'small'], attempt)
      expect(result).toBe('reply from small')
      expect(tried).toEqual(['primary', 'large', 'small'])
    })

    it("rethrows the primary model's error when every model fails", async () => {
      const { tried, attempt } = attempts(null)
      await expect(completeWithFallback('primary', ['large', 'small'], attempt)).rejects.toThrow(
        'primary unavailable'
      )
      expect(tried).toEqual(['primary', 'large', 'small'])
    })

    it('stops after an abort', async () => {
      const controller = new AbortController()
      controller.abort()
      const { tried, attempt } = attempts('large')
      await expect(completeWithFallback('primary', ['large'], attempt, controller.signal)).rejects.toThrow(
        'primary unavailable'
      )
      expect(tried).toEqual(['primary'])
    })
  })

  describe('createGroqLlmClient', () => {
    it('builds a client without contacting the service', () => {
      const client = createGroqLlmClient({
        apiKey: 'gsk_test-secret',
        model: 'llama-3.3-70b-versatile',
        baseUrl: DEFAULT_GROQ_BASE_URL,
        substituteModels: SUBSTITUTE_MODELS,
      })
      expect(typeof client.complete).toBe('function')
    })
  })
})

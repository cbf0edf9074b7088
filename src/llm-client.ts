/**
 * LLM Client
 *
 * Minimal text-completion port used by the reorderer, plus the Groq-backed
 * implementation (OpenAI-compatible chat API through the AI SDK). A failing
 * model is retried once on each substitute model, in order.
 */

import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import type { LlmConfig } from './config'

export type LlmRequest = {
  system: string
  prompt: string
  temperature?: number
  maxTokens?: number
}

export type LlmCallOptions = {
  signal?: AbortSignal
}

export interface LlmClient {
  complete(request: LlmRequest, options?: LlmCallOptions): Promise<string>
}

/**
 * Runs `attempt` with the primary model, then with each substitute that differs
 * from it. Rethrows the primary model's error when every attempt fails or the
 * signal has been aborted.
 */
export async function completeWithFallback(
  primary: string,
  substitutes: readonly string[],
  attempt: (model: string) => Promise<string>,
  signal?: AbortSignal
): Promise<string> {
  try {
    return await attempt(primary)
  } catch (primaryError) {
    for (const model of substitutes) {
      if (model === primary) continue
      if (signal?.aborted) break
      try {
        return await attempt(model)
      } catch {
        continue
      }
    }
    throw primaryError
  }
}

export function createGroqLlmClient(config: LlmConfig): LlmClient {
  const provider = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl })

  return {
    async complete(request, options = {}) {
      return completeWithFallback(
        config.model,
        config.substituteModels,
        async (model) => {
          const { text } = await generateText({
            model: provider.chat(model),
            system: request.system,
            prompt: request.prompt,
            temperature: request.temperature ?? 0.2,
            maxTokens: request.maxTokens ?? 1200,
            maxRetries: 0,
            abortSignal: options.signal,
          })
          return text
        },
        options.signal
      )
    },
  }
}

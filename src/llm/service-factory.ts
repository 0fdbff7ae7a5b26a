import { LlmServiceError } from '../errors.js'
import type { LlmProvider } from '../repository/types.js'
import { AnthropicService } from './anthropic.js'
import { OpenAIService } from './openai.js'
import type { LlmService } from './types.js'

/**
 * Builds the service for a provider record.
 *
 * @param provider - Provider with its credentials
 * @returns A service for the provider's type
 * @throws LlmServiceError when the provider cannot be configured
 */
export function createLlmService(provider: LlmProvider): LlmService {
  const { apiKey, baseUrl, organization } = provider.config
  switch (provider.type) {
    case 'openai':
      return new OpenAIService({
        ...(apiKey ? { apiKey } : {}),
        clientConfig: {
          ...(baseUrl ? { baseURL: baseUrl } : {}),
          ...(organization ? { organization } : {}),
        },
      })
    case 'anthropic':
      return new AnthropicService({
        ...(apiKey ? { apiKey } : {}),
        clientConfig: baseUrl ? { baseURL: baseUrl } : {},
      })
    default: {
      const unknownType: never = provider.type
      throw new LlmServiceError(`Unsupported LLM provider type: ${String(unknownType)}`)
    }
  }
}

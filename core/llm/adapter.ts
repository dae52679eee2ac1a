// Provider seams. Concrete adapters live in infra/; tests use in-memory fakes.

export interface LLMUsage {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}

export interface EmbeddingProvider {
  // Throws on transport / quota failure. No retry policy at this level.
  embed(text: string): Promise<number[]>
}

export interface CompletionInput {
  systemPrompt: string
  userPrompt: string
  temperature: number
  maxTokens: number
  // Ask the provider for a JSON object response.
  json?: boolean
}

export interface CompletionOutput {
  text: string
  modelUsed: string
  usage?: LLMUsage
  latencyMs?: number
}

export interface CompletionProvider {
  complete(input: CompletionInput): Promise<CompletionOutput>
}

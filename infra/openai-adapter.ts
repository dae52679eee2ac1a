import { z } from "zod"
import type { CompletionInput, CompletionOutput, CompletionProvider, EmbeddingProvider, LLMUsage } from "../core/llm/adapter.js"
import { ProviderError } from "../src/lib/errors.js"
import type { Logger } from "../src/lib/log.js"

export interface OpenAIAdapterOptions {
  apiKey: string
  baseUrl?: string
  embeddingModel: string
  completionModel: string
  timeoutMs?: number
  maxAttempts?: number
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  log?: Logger
}

const embeddingsResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
})

const chatResponse = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
})

type ChatUsage = z.infer<typeof chatResponse>["usage"]

function defaultSleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms))
}

function jitter(ms: number) {
  const j = Math.floor(Math.random() * Math.min(250, ms))
  return ms + j
}

function isRetryableStatus(status: number) {
  return status === 429 || status === 408 || (status >= 500 && status <= 599)
}

function parseOpenAIErrorMessage(bodyText: string): string | null {
  try {
    const j: unknown = JSON.parse(bodyText)
    const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(j)
    return parsed.success ? parsed.data.error.message : null
  } catch {
    return null
  }
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError"
}

function isNetworkError(e: unknown): boolean {
  if (!(e instanceof Error)) return false
  return ["fetch failed", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT"].some((s) => e.message.includes(s))
}

/**
 * OpenAI over plain fetch: embeddings + chat completions.
 * Retries here are transport-level only: 408/429/5xx, timeouts and transient
 * network errors, with exponential backoff, up to `maxAttempts` per call.
 * Callers (CV ingestion, shortlisting) make a single call and never retry;
 * once the attempts are spent the failure surfaces as a ProviderError.
 */
export class OpenAIAdapter implements EmbeddingProvider, CompletionProvider {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly embeddingModel: string
  private readonly completionModel: string
  private readonly timeoutMs: number
  private readonly maxAttempts: number
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log?: Logger

  constructor(opts: OpenAIAdapterOptions) {
    this.apiKey = opts.apiKey
    this.baseUrl = (opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "")
    this.embeddingModel = opts.embeddingModel
    this.completionModel = opts.completionModel
    this.timeoutMs = opts.timeoutMs ?? 25000
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3)
    this.fetchImpl = opts.fetchImpl ?? fetch
    this.sleep = opts.sleep ?? defaultSleep
    this.log = opts.log
  }

  async embed(text: string): Promise<number[]> {
    const body = await this.post("/embeddings", { model: this.embeddingModel, input: text })
    const parsed = embeddingsResponse.safeParse(body)
    if (!parsed.success) throw new ProviderError("OPENAI_UNEXPECTED_RESPONSE")
    return parsed.data.data[0].embedding
  }

  async complete(input: CompletionInput): Promise<CompletionOutput> {
    const started = Date.now()
    const payload = {
      model: this.completionModel,
      temperature: input.temperature,
      max_tokens: input.maxTokens,
      messages: [
        { role: "system", content: input.systemPrompt },
        { role: "user", content: input.userPrompt },
      ],
      ...(input.json ? { response_format: { type: "json_object" } } : {}),
    }

    const body = await this.post("/chat/completions", payload)
    const parsed = chatResponse.safeParse(body)
    if (!parsed.success) throw new ProviderError("OPENAI_UNEXPECTED_RESPONSE")

    const content = parsed.data.choices[0].message.content
    if (content == null) throw new ProviderError("OPENAI_EMPTY_COMPLETION")

    return {
      text: content,
      modelUsed: this.completionModel,
      usage: this.mapUsage(parsed.data.usage),
      latencyMs: Date.now() - started,
    }
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    let lastErr: unknown = null

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const controller = new AbortController()
      const t = setTimeout(() => controller.abort(), this.timeoutMs)

      try {
        const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        })

        const text = await res.text()

        if (!res.ok) {
          const msg = parseOpenAIErrorMessage(text)
          const err = new ProviderError(`OPENAI_ERROR_${res.status}: ${(msg ?? text).slice(0, 400)}`, res.status)

          if (isRetryableStatus(res.status) && attempt < this.maxAttempts) {
            lastErr = err
            await this.backoff(path, attempt, res.status)
            continue
          }
          throw err
        }

        try {
          return JSON.parse(text)
        } catch {
          throw new ProviderError("OPENAI_NON_JSON_RESPONSE", res.status)
        }
      } catch (e: unknown) {
        if (e instanceof ProviderError) throw e
        lastErr = e

        const isAbort = isAbortError(e)
        if ((isAbort || isNetworkError(e)) && attempt < this.maxAttempts) {
          await this.backoff(path, attempt, null)
          continue
        }

        if (isAbort) throw new ProviderError("OPENAI_TIMEOUT")
        throw new ProviderError(e instanceof Error ? e.message : "OPENAI_UNKNOWN_ERROR")
      } finally {
        clearTimeout(t)
      }
    }

    throw lastErr instanceof Error ? lastErr : new ProviderError("OPENAI_UNKNOWN_ERROR")
  }

  // 500ms, 1000ms, 2000ms (+ jitter)
  private async backoff(path: string, attempt: number, status: number | null) {
    const ms = jitter(500 * Math.pow(2, attempt - 1))
    this.log?.debug("provider_retry", { path, attempt, status, backoffMs: ms })
    await this.sleep(ms)
  }

  private mapUsage(u: ChatUsage): LLMUsage | undefined {
    if (!u) return undefined
    return {
      inputTokens: u.prompt_tokens,
      outputTokens: u.completion_tokens,
      totalTokens: u.total_tokens,
    }
  }
}

import { describe, expect, it } from "vitest"
import { OpenAIAdapter } from "./openai-adapter.js"
import { ProviderError } from "../src/lib/errors.js"

type Call = { url: string; body: unknown; auth: string | null }

function scriptedFetch(replies: Array<() => Response | Promise<Response>>) {
  const calls: Call[] = []
  let i = 0
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers)
    calls.push({
      url: String(input),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null,
      auth: headers.get("authorization"),
    })
    const reply = replies[Math.min(i++, replies.length - 1)]
    return reply()
  }
  return { calls, fetchImpl }
}

const json = (status: number, body: unknown) => () =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } })

function adapter(fetchImpl: typeof fetch, maxAttempts = 3) {
  const sleeps: number[] = []
  const a = new OpenAIAdapter({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1/",
    embeddingModel: "embed-model",
    completionModel: "chat-model",
    maxAttempts,
    fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms)
    },
  })
  return { a, sleeps }
}

describe("OpenAIAdapter.embed", () => {
  it("posts the text and returns the vector", async () => {
    const { calls, fetchImpl } = scriptedFetch([json(200, { data: [{ embedding: [0.1, 0.2] }] })])
    const { a } = adapter(fetchImpl)

    expect(await a.embed("hello")).toEqual([0.1, 0.2])
    expect(calls).toEqual([
      { url: "https://llm.test/v1/embeddings", body: { model: "embed-model", input: "hello" }, auth: "Bearer test-key" },
    ])
  })

  it("retries 429 then succeeds", async () => {
    const { calls, fetchImpl } = scriptedFetch([
      json(429, { error: { message: "slow down" } }),
      json(200, { data: [{ embedding: [1] }] }),
    ])
    const { a, sleeps } = adapter(fetchImpl)

    expect(await a.embed("x")).toEqual([1])
    expect(calls).toHaveLength(2)
    expect(sleeps).toHaveLength(1)
    expect(sleeps[0]).toBeGreaterThanOrEqual(500)
  })

  it("gives up after the last attempt with the upstream message", async () => {
    const { calls, fetchImpl } = scriptedFetch([json(503, { error: { message: "overloaded" } })])
    const { a } = adapter(fetchImpl, 2)

    await expect(a.embed("x")).rejects.toThrow("OPENAI_ERROR_503: overloaded")
    expect(calls).toHaveLength(2)
  })

  it("makes one call when maxAttempts is 1", async () => {
    const { calls, fetchImpl } = scriptedFetch([json(503, { error: { message: "overloaded" } })])
    const { a, sleeps } = adapter(fetchImpl, 1)

    await expect(a.embed("x")).rejects.toThrow("OPENAI_ERROR_503: overloaded")
    expect(calls).toHaveLength(1)
    expect(sleeps).toEqual([])
  })

  it("does not retry a 401", async () => {
    const { calls, fetchImpl } = scriptedFetch([json(401, { error: { message: "bad key" } })])
    const { a } = adapter(fetchImpl)

    const err = await a.embed("x").catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ProviderError)
    expect(err).toMatchObject({ status: 401, message: "OPENAI_ERROR_401: bad key" })
    expect(calls).toHaveLength(1)
  })

  it("retries network failures", async () => {
    const { calls, fetchImpl } = scriptedFetch([
      () => {
        throw new TypeError("fetch failed")
      },
      json(200, { data: [{ embedding: [2] }] }),
    ])
    const { a } = adapter(fetchImpl)
    expect(await a.embed("x")).toEqual([2])
    expect(calls).toHaveLength(2)
  })

  it("rejects an unexpected body", async () => {
    const { fetchImpl } = scriptedFetch([json(200, { data: [] })])
    await expect(adapter(fetchImpl).a.embed("x")).rejects.toThrow("OPENAI_UNEXPECTED_RESPONSE")
  })
})

describe("OpenAIAdapter.complete", () => {
  it("sends prompts, temperature and json mode", async () => {
    const { calls, fetchImpl } = scriptedFetch([
      json(200, {
        choices: [{ message: { content: '{"ok":true}' } }],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      }),
    ])
    const { a } = adapter(fetchImpl)

    const out = await a.complete({ systemPrompt: "sys", userPrompt: "usr", temperature: 0.3, maxTokens: 500, json: true })

    expect(out.text).toBe('{"ok":true}')
    expect(out.modelUsed).toBe("chat-model")
    expect(out.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 })
    expect(calls[0].url).toBe("https://llm.test/v1/chat/completions")
    expect(calls[0].body).toEqual({
      model: "chat-model",
      temperature: 0.3,
      max_tokens: 500,
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "usr" },
      ],
      response_format: { type: "json_object" },
    })
  })

  it("omits json mode when not asked", async () => {
    const { calls, fetchImpl } = scriptedFetch([json(200, { choices: [{ message: { content: "[]" } }] })])
    await adapter(fetchImpl).a.complete({ systemPrompt: "s", userPrompt: "u", temperature: 0.2, maxTokens: 200 })
    expect(calls[0].body).not.toHaveProperty("response_format")
  })

  it("treats a null message as a failure", async () => {
    const { fetchImpl } = scriptedFetch([json(200, { choices: [{ message: { content: null } }] })])
    await expect(
      adapter(fetchImpl).a.complete({ systemPrompt: "s", userPrompt: "u", temperature: 0, maxTokens: 1 })
    ).rejects.toThrow("OPENAI_EMPTY_COMPLETION")
  })
})

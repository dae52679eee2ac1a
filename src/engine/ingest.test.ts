import { describe, expect, it } from "vitest"
import { REQUIREMENTS_FAILED } from "../../core/llm/analyzer.js"
import { getCvsWithEmbeddings, listCvsForOwner } from "../../infra/db/cvs.js"
import { getJobForOwner } from "../../infra/db/jobs.js"
import { ProviderError } from "../lib/errors.js"
import { FakeCompletion } from "../testing/fakes.js"
import { alice, testDeps } from "../testing/harness.js"
import { DEFAULT_JOB_TITLE, createJob, ingestCv, reviseJob } from "./ingest.js"

const CV_TEXT = "Jane Doe\njane@example.com\n(555) 123-4567\nPython engineer, six years of API work."
const JOB_TEXT = "We are hiring a backend engineer with five years of Python and SQL experience."

const txt = (text: string, filename = "jane.txt") => ({ bytes: Buffer.from(text, "utf8"), filename })

describe("ingestCv", () => {
  it("stores text, heuristics and the embedding", async () => {
    const deps = testDeps()
    deps.embedder.set(CV_TEXT, [0.6, 0.8])

    const cv = await ingestCv(deps, alice, txt(CV_TEXT))

    expect(cv.owner_id).toBe("user:1")
    expect(cv.filename).toBe("jane.txt")
    expect(cv.content).toBe(CV_TEXT)
    expect(cv.candidate_name).toBe("Jane Doe")
    expect(cv.contact_info).toEqual({ email: "jane@example.com", phone: "+1-555-123-4567" })
    expect(cv.created_at).toBe("2025-01-15T10:00:00.000Z")
    expect(deps.embedder.calls).toEqual([CV_TEXT])

    const [stored] = getCvsWithEmbeddings(deps.db, [cv.id], "user:1")
    expect(stored.embedding).toEqual([0.6, 0.8])
  })

  it("stores nothing when embedding fails", async () => {
    const deps = testDeps()
    deps.embedder.failWith = new ProviderError("OPENAI_TIMEOUT")

    await expect(ingestCv(deps, alice, txt(CV_TEXT))).rejects.toMatchObject({
      code: "provider_error",
      status: 502,
      message: "CV embedding failed: OPENAI_TIMEOUT",
    })
    expect(listCvsForOwner(deps.db, "user:1")).toEqual([])
  })

  it("refuses unsupported files before calling the provider", async () => {
    const deps = testDeps()

    await expect(ingestCv(deps, alice, txt(CV_TEXT, "cv.rtf"))).rejects.toMatchObject({
      code: "unsupported_format",
      message: "Unsupported file type: .rtf",
    })
    expect(deps.embedder.calls).toEqual([])
  })
})

describe("createJob", () => {
  it("extracts key requirements and fills in defaults", async () => {
    const deps = testDeps(new FakeCompletion(JSON.stringify({ requirements: [" Python ", "SQL", ""] })))

    const job = await createJob(deps, alice, { content: `  ${JOB_TEXT}  ` })

    expect(job.title).toBe(DEFAULT_JOB_TITLE)
    expect(job.summary).toBe("")
    expect(job.content).toBe(JOB_TEXT)
    expect(job.key_requirements).toEqual(["Python", "SQL"])
    expect(getJobForOwner(deps.db, job.id, "user:1")?.key_requirements).toEqual(["Python", "SQL"])
  })

  it("keeps the job when requirement extraction fails", async () => {
    const deps = testDeps(new FakeCompletion("not json"))

    const job = await createJob(deps, alice, { title: "Backend", content: JOB_TEXT })

    expect(job.title).toBe("Backend")
    expect(job.key_requirements).toEqual([REQUIREMENTS_FAILED])
  })

  it("rejects content that is too short", async () => {
    const deps = testDeps()

    await expect(createJob(deps, alice, { content: "Python dev" })).rejects.toMatchObject({
      code: "extraction_failed",
      status: 422,
    })
    expect(deps.completion.calls).toHaveLength(0)
  })
})

describe("reviseJob", () => {
  it("only re-derives requirements when the content changes", async () => {
    const deps = testDeps(new FakeCompletion('["Python"]', '["Go", "Kubernetes"]'))
    const job = await createJob(deps, alice, { title: "Backend", content: JOB_TEXT })

    const renamed = await reviseJob(deps, job, { title: "Platform" })
    expect(renamed.title).toBe("Platform")
    expect(renamed.key_requirements).toEqual(["Python"])
    expect(deps.completion.calls).toHaveLength(1)

    const rewritten = await reviseJob(deps, renamed, {
      content: "We now need a platform engineer who knows Go and Kubernetes in production.",
    })
    expect(rewritten.title).toBe("Platform")
    expect(rewritten.key_requirements).toEqual(["Go", "Kubernetes"])
    expect(getJobForOwner(deps.db, job.id, "user:1")?.key_requirements).toEqual(["Go", "Kubernetes"])
  })
})

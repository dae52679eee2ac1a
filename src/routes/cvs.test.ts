import request from "supertest"
import { describe, expect, it } from "vitest"
import { ProviderError } from "../lib/errors.js"
import { FakeEmbedder } from "../testing/fakes.js"
import { testApp, userToken } from "../testing/harness.js"

const CV_TEXT = "Jane Doe\njane@example.com\n555-123-4567\nBackend engineer, Python and PostgreSQL."

describe("CV routes", () => {
  it("uploads a CV and returns it without the embedding", async () => {
    const embedder = new FakeEmbedder().set(CV_TEXT, [0.6, 0.8])
    const { app } = testApp({ embedder })
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/cvs/upload")
      .auth(token, { type: "bearer" })
      .attach("file", Buffer.from(CV_TEXT, "utf8"), "jane.txt")

    expect(res.status).toBe(201)
    expect(res.body).toMatchObject({
      filename: "jane.txt",
      candidate_name: "Jane Doe",
      contact_info: { email: "jane@example.com", phone: "+1-555-123-4567" },
      content: CV_TEXT,
      owner_id: "user:1",
    })
    expect(res.body).not.toHaveProperty("embedding")
    expect(embedder.calls).toEqual([CV_TEXT])

    const one = await request(app).get(`/cvs/${res.body.id}`).auth(token, { type: "bearer" })
    expect(one.status).toBe(200)
    expect(one.body.id).toBe(res.body.id)
  })

  it("refuses unsupported file types", async () => {
    const { app } = testApp()
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/cvs/upload")
      .auth(token, { type: "bearer" })
      .attach("file", Buffer.from("{\\rtf1 hi}"), "cv.rtf")

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({
      error: "unsupported_format",
      message: "Unsupported file type: .rtf",
      details: { allowed: [".txt", ".docx", ".pdf"] },
    })
  })

  it("requires the file field", async () => {
    const { app } = testApp()
    const token = await userToken(app, "alice")

    const res = await request(app).post("/cvs/upload").auth(token, { type: "bearer" }).field("note", "no file")

    expect(res.status).toBe(400)
    expect(res.body.message).toBe("A file is required in the 'file' form field")
  })

  it("rejects files over the upload limit", async () => {
    const { app } = testApp({ maxUploadBytes: 16 })
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/cvs/upload")
      .auth(token, { type: "bearer" })
      .attach("file", Buffer.from(CV_TEXT, "utf8"), "jane.txt")

    expect(res.status).toBe(400)
    expect(res.body.message).toBe("File exceeds the 16 byte upload limit")
  })

  it("answers 502 and stores nothing when embedding fails", async () => {
    const embedder = new FakeEmbedder()
    embedder.failWith = new ProviderError("OPENAI_ERROR_500: boom", 500)
    const { app } = testApp({ embedder })
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/cvs/upload")
      .auth(token, { type: "bearer" })
      .attach("file", Buffer.from(CV_TEXT, "utf8"), "jane.txt")

    expect(res.status).toBe(502)
    expect(res.body).toMatchObject({ error: "provider_error", message: "CV embedding failed: OPENAI_ERROR_500: boom" })
    expect((await request(app).get("/cvs").auth(token, { type: "bearer" })).body).toEqual([])
  })

  it("keeps CVs private to their owner", async () => {
    const { app } = testApp()
    const alice = await userToken(app, "alice")
    const bob = await userToken(app, "bob")
    const up = await request(app)
      .post("/cvs/upload")
      .auth(alice, { type: "bearer" })
      .attach("file", Buffer.from(CV_TEXT, "utf8"), "jane.txt")

    expect((await request(app).get(`/cvs/${up.body.id}`).auth(bob, { type: "bearer" })).status).toBe(404)
    expect((await request(app).delete(`/cvs/${up.body.id}`).auth(bob, { type: "bearer" })).status).toBe(404)
    expect((await request(app).get("/cvs").auth(bob, { type: "bearer" })).body).toEqual([])

    expect((await request(app).delete(`/cvs/${up.body.id}`).auth(alice, { type: "bearer" })).status).toBe(204)
    expect((await request(app).get(`/cvs/${up.body.id}`).auth(alice, { type: "bearer" })).status).toBe(404)
  })

  it("rejects a non-numeric id", async () => {
    const { app } = testApp()
    const token = await userToken(app, "alice")

    const res = await request(app).get("/cvs/abc").auth(token, { type: "bearer" })

    expect(res.status).toBe(400)
    expect(res.body.error).toBe("validation_error")
  })
})

import request from "supertest"
import { describe, expect, it } from "vitest"
import { FakeCompletion } from "../testing/fakes.js"
import { clientToken, testApp, userToken } from "../testing/harness.js"

const JOB_TEXT = "Need a backend engineer with 5 years Python experience building APIs."

describe("job routes", () => {
  it("creates a job from JSON and extracts requirements", async () => {
    const { app } = testApp({ completion: new FakeCompletion('["Python", "APIs"]') })
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/jobs")
      .auth(token, { type: "bearer" })
      .send({ title: "Backend Engineer", content: JOB_TEXT })

    expect(res.status).toBe(201)
    expect(res.body).toMatchObject({
      title: "Backend Engineer",
      summary: "",
      content: JOB_TEXT,
      key_requirements: ["Python", "APIs"],
    })
  })

  it("creates a job from an uploaded file", async () => {
    const { app } = testApp({ completion: new FakeCompletion('{"requirements": ["Python"]}') })
    const token = await userToken(app, "alice")

    const res = await request(app)
      .post("/jobs")
      .auth(token, { type: "bearer" })
      .field("title", "From file")
      .attach("file", Buffer.from(JOB_TEXT, "utf8"), "job.txt")

    expect(res.status).toBe(201)
    expect(res.body).toMatchObject({ title: "From file", content: JOB_TEXT, key_requirements: ["Python"] })
  })

  it("refuses job descriptions that are too short", async () => {
    const { app } = testApp()
    const token = await userToken(app, "alice")

    const res = await request(app).post("/jobs").auth(token, { type: "bearer" }).send({ content: "Python dev" })

    expect(res.status).toBe(422)
    expect(res.body.error).toBe("extraction_failed")
  })

  it("updates and deletes a job", async () => {
    const { app } = testApp({ completion: new FakeCompletion('["Python"]') })
    const token = await userToken(app, "alice")
    const created = await request(app).post("/jobs").auth(token, { type: "bearer" }).send({ content: JOB_TEXT })
    expect(created.body.title).toBe("Job Description")

    const updated = await request(app)
      .put(`/jobs/${created.body.id}`)
      .auth(token, { type: "bearer" })
      .send({ title: "Senior Backend", summary: "Platform team" })
    expect(updated.status).toBe(200)
    expect(updated.body).toMatchObject({ title: "Senior Backend", summary: "Platform team", content: JOB_TEXT })

    expect((await request(app).delete(`/jobs/${created.body.id}`).auth(token, { type: "bearer" })).status).toBe(204)
    expect((await request(app).get(`/jobs/${created.body.id}`).auth(token, { type: "bearer" })).status).toBe(404)
  })

  it("scopes client-owned jobs to the client", async () => {
    const { app } = testApp({ completion: new FakeCompletion('["Python"]') })
    const admin = await userToken(app, "root")
    const { clientId, token } = await clientToken(app, admin)

    const created = await request(app).post("/jobs").auth(token, { type: "bearer" }).send({ content: JOB_TEXT })
    expect(created.body.owner_id).toBe(`client:${clientId}`)

    expect((await request(app).get("/jobs").auth(admin, { type: "bearer" })).body).toEqual([])
    expect((await request(app).get("/jobs").auth(token, { type: "bearer" })).body).toHaveLength(1)
  })
})

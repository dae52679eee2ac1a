import { describe, expect, it } from "vitest"
import { countUsers } from "../../infra/db/users.js"
import { testApp } from "../testing/harness.js"

const newUser = { email: "dup@example.com", username: "dup", password: "test-password" }

describe("AuthService.register", () => {
  it("lets exactly one of two simultaneous registrations win", async () => {
    const { deps } = testApp()

    // both calls pass the existence check before either insert runs
    const outcomes = await Promise.allSettled([deps.auth.register(newUser), deps.auth.register(newUser)])

    expect(outcomes.map((o) => o.status).sort()).toEqual(["fulfilled", "rejected"])
    expect(outcomes.find((o) => o.status === "rejected")).toMatchObject({
      reason: { code: "validation_error", status: 400, message: "Username or email already registered" },
    })
    expect(countUsers(deps.db)).toBe(1)
  })

  it("refuses a taken email before hashing", async () => {
    const { deps } = testApp()
    await deps.auth.register(newUser)

    await expect(
      deps.auth.register({ email: "dup@example.com", username: "someone-else", password: "test-password" })
    ).rejects.toMatchObject({ code: "validation_error" })
  })
})

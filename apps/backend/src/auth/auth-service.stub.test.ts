import { describe, expect, test } from "vitest"
import { StubAuthService } from "./auth-service.stub"

describe("StubAuthService", () => {
  const service = new StubAuthService()

  test("should accept a user id as its own token", async () => {
    expect(await service.authenticateToken("@alice:test")).toEqual({ userId: "@alice:test" })
  })

  test.each([["alice"], ["@alice"], ["@alice :test"], [""]])("should reject %j", async (token) => {
    expect(await service.authenticateToken(token)).toBeNull()
  })
})

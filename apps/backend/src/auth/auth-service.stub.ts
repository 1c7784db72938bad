import type { AuthService, AuthenticatedUser } from "./auth-service"

const STUB_USER_ID_PATTERN = /^@[^:\s]+:[^\s]+$/

/**
 * Development auth: the bearer token is the user id itself (e.g. "@alice:test").
 */
export class StubAuthService implements AuthService {
  async authenticateToken(token: string): Promise<AuthenticatedUser | null> {
    return STUB_USER_ID_PATTERN.test(token) ? { userId: token } : null
  }
}

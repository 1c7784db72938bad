export interface AuthenticatedUser {
  userId: string
}

/**
 * Resolves a bearer token to the user it was issued to.
 * Session management lives outside this server; implementations only answer the lookup.
 */
export interface AuthService {
  authenticateToken(token: string): Promise<AuthenticatedUser | null>
}

export class StaticTokenAuthService implements AuthService {
  constructor(private tokens: ReadonlyMap<string, string>) {}

  async authenticateToken(token: string): Promise<AuthenticatedUser | null> {
    const userId = this.tokens.get(token)
    return userId ? { userId } : null
  }
}

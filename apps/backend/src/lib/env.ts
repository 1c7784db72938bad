import { logger } from "./logger"

export interface AuthConfig {
  useStubAuth: boolean
  /** Bearer token to user id, parsed from AUTH_TOKENS ("token:@user:server,token2:@other:server") */
  tokens: Map<string, string>
}

export interface Config {
  port: number
  databaseUrl: string
  auth: AuthConfig
}

export function parseAuthTokens(raw: string | undefined): Map<string, string> {
  const tokens = new Map<string, string>()
  if (!raw) return tokens

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim()
    if (!trimmed) continue

    // User ids may contain ":" themselves, so only the first separator splits
    const separator = trimmed.indexOf(":")
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(`Invalid AUTH_TOKENS entry "${trimmed}": expected token:userId`)
    }
    tokens.set(trimmed.slice(0, separator), trimmed.slice(separator + 1))
  }

  return tokens
}

export function loadConfig(): Config {
  const useStubAuth = process.env.USE_STUB_AUTH === "true"

  if (!process.env.DATABASE_URL) {
    throw new Error("DATABASE_URL is required")
  }

  const tokens = parseAuthTokens(process.env.AUTH_TOKENS)
  if (!useStubAuth && tokens.size === 0) {
    throw new Error("Missing required environment variables: AUTH_TOKENS")
  }

  const config: Config = {
    port: Number(process.env.PORT) || 3001,
    databaseUrl: process.env.DATABASE_URL,
    auth: {
      useStubAuth,
      tokens,
    },
  }

  if (useStubAuth) {
    logger.warn("Using stub auth service - NOT FOR PRODUCTION")
  }

  return config
}

/**
 * Test server module - serves the full Express app on a random port.
 *
 * Storage is the in-memory stand-in and auth is the stub service, so the bearer token is the
 * user id itself.
 */

import { createServer } from "http"
import { buildApp } from "../src/server"
import { StubAuthService } from "../src/auth/auth-service.stub"
import { InMemoryStore, createFakePool } from "./in-memory-store"

export interface TestServer {
  url: string
  store: InMemoryStore
  stop: () => Promise<void>
}

export async function startTestServer(): Promise<TestServer> {
  const store = new InMemoryStore()
  store.install()

  const app = buildApp({ pool: createFakePool(), authService: new StubAuthService() })
  const server = createServer(app)

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject)
    server.listen(0, "127.0.0.1", () => resolve())
  })

  const address = server.address()
  if (!address || typeof address === "string") {
    throw new Error("Could not get server address")
  }
  const { port } = address

  return {
    url: `http://127.0.0.1:${port}`,
    store,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      }),
  }
}

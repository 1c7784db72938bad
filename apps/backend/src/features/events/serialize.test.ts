import { describe, expect, test } from "vitest"
import type { RoomEvent } from "./repository"
import { toClientEvent } from "./serialize"

function makeEvent(overrides: Partial<RoomEvent> = {}): RoomEvent {
  return {
    id: "event_1",
    roomId: "room_1",
    type: "m.room.message",
    stateKey: null,
    sender: "@alice:test",
    content: { body: "hello" },
    redacts: null,
    topologicalOrdering: 3n,
    streamOrdering: 7n,
    originServerTs: 1_700_000_000_000,
    redactedAt: null,
    redactedBy: null,
    ...overrides,
  }
}

describe("toClientEvent", () => {
  test("should use wire field names and omit absent optional fields", () => {
    expect(toClientEvent(makeEvent())).toEqual({
      event_id: "event_1",
      room_id: "room_1",
      type: "m.room.message",
      sender: "@alice:test",
      content: { body: "hello" },
      origin_server_ts: 1_700_000_000_000,
      unsigned: {},
    })
  })

  test("should include state_key and redacts when present", () => {
    const member = toClientEvent(makeEvent({ type: "m.room.member", stateKey: "@alice:test" }))
    const redaction = toClientEvent(makeEvent({ type: "m.room.redaction", redacts: "event_0" }))

    expect([member.state_key, redaction.redacts]).toEqual(["@alice:test", "event_0"])
  })

  test("should empty the content of a redacted event and name the redaction", () => {
    const event = toClientEvent(
      makeEvent({ redactedAt: new Date("2026-01-01T00:00:00.000Z"), redactedBy: "event_redaction" })
    )

    expect([event.content, event.unsigned]).toEqual([{}, { redacted_because: "event_redaction" }])
  })

  test("should keep membership on a redacted member event", () => {
    const event = toClientEvent(
      makeEvent({
        type: "m.room.member",
        stateKey: "@alice:test",
        content: { membership: "join", displayname: "Alice" },
        redactedAt: new Date("2026-01-01T00:00:00.000Z"),
        redactedBy: "event_redaction",
      })
    )

    expect(event.content).toEqual({ membership: "join" })
  })

  test("should attach the given unsigned data without touching the stored event", () => {
    const stored = makeEvent()
    const event = toClientEvent(stored, { "m.relations": { "m.replace": { event_id: "event_edit", origin_server_ts: 5, sender: "@alice:test" } } })

    expect(event.unsigned).toEqual({
      "m.relations": { "m.replace": { event_id: "event_edit", origin_server_ts: 5, sender: "@alice:test" } },
    })
    expect(stored).not.toHaveProperty("unsigned")
  })
})

import { ulid } from "ulid"

function generateId(prefix: string): string {
  return `${prefix}_${ulid()}`
}

export const roomId = () => generateId("room")
export const eventId = () => generateId("event")

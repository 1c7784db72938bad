import type { PoolClient } from "pg"
import { EventTypes } from "@relatable/types"
import { EventRepository, type RoomEvent } from "../../src/features/events/repository"
import { indexRelation } from "../../src/features/relations/indexer"
import type { RelationEdge } from "../../src/features/relations/repository"
import { RoomRepository } from "../../src/features/rooms/repository"
import { eventId, roomId } from "../../src/lib/id"

export const ALICE = "@alice:test"
export const BOB = "@bob:test"

const ORIGIN_SERVER_TS = 1_700_000_000_000

export async function insertRoom(client: PoolClient): Promise<string> {
  const id = roomId()
  await RoomRepository.insert(client, { id, createdBy: ALICE })
  return id
}

export async function insertMessage(client: PoolClient, room: string, sender: string = ALICE): Promise<RoomEvent> {
  return EventRepository.insert(client, {
    id: eventId(),
    roomId: room,
    type: EventTypes.MESSAGE,
    sender,
    content: { body: "hello" },
    originServerTs: ORIGIN_SERVER_TS,
  })
}

export interface RelateParams {
  relationType: string
  eventType?: string
  key?: string
  sender?: string
}

/**
 * Persist a relation event pointing at `parent` and index it the way ingest does.
 */
export async function relate(client: PoolClient, parent: RoomEvent, params: RelateParams): Promise<RelationEdge> {
  const event = await EventRepository.insert(client, {
    id: eventId(),
    roomId: parent.roomId,
    type: params.eventType ?? EventTypes.REACTION,
    sender: params.sender ?? ALICE,
    content: {},
    originServerTs: ORIGIN_SERVER_TS,
  })
  return indexRelation(client, event, { eventId: parent.id, relationType: params.relationType, key: params.key ?? null })
}

import { BUNDLED_RELATIONS_KEY, EventTypes, type ClientEvent } from "@relatable/types"
import type { RoomEvent } from "../events/repository"
import { toClientEvent } from "../events/serialize"
import type { RelationService } from "./service"

function isBundleable(event: RoomEvent): boolean {
  return event.redactedAt === null && event.type !== EventTypes.REDACTION
}

/**
 * Decorates events with their relation summaries under `unsigned["m.relations"]`.
 * Always returns new client objects; stored events are left as they are.
 */
export class RelationBundler {
  constructor(private relationService: RelationService) {}

  async bundle(event: RoomEvent): Promise<ClientEvent> {
    const [bundled] = await this.bundleMany([event])
    return bundled
  }

  async bundleMany(events: RoomEvent[]): Promise<ClientEvent[]> {
    const bundles = await this.relationService.getBundledRelations(events.filter(isBundleable))

    return events.map((event) => {
      const relations = bundles.get(event.id)
      return toClientEvent(event, relations ? { [BUNDLED_RELATIONS_KEY]: relations } : {})
    })
  }
}

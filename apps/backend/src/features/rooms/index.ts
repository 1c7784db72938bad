export { RoomRepository } from "./repository"
export type { Room } from "./repository"
export { RoomMemberRepository } from "./member-repository"
export type { RoomMember } from "./member-repository"
export { RoomService } from "./service"
export type { JoinRoomResult } from "./service"
export { assertJoined } from "./access"
export { createRoomHandlers } from "./handlers"

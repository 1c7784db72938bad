interface HttpErrorOptions {
  status: number
  code?: string
  cause?: unknown
}

export class HttpError extends Error {
  readonly status: number
  readonly code?: string

  constructor(message: string, { status, code, cause }: HttpErrorOptions) {
    super(message, { cause })
    this.status = status
    this.code = code
    this.name = "HttpError"
  }
}

export class RoomNotFoundError extends HttpError {
  constructor() {
    super("Room not found", {
      status: 404,
      code: "ROOM_NOT_FOUND",
    })
    this.name = "RoomNotFoundError"
  }
}

export class EventNotFoundError extends HttpError {
  constructor(message = "Event not found") {
    super(message, {
      status: 404,
      code: "EVENT_NOT_FOUND",
    })
    this.name = "EventNotFoundError"
  }
}

export class InvalidRelationError extends HttpError {
  constructor(message: string) {
    super(message, {
      status: 400,
      code: "INVALID_RELATION",
    })
    this.name = "InvalidRelationError"
  }
}

export class InvalidCursorError extends HttpError {
  constructor(message = "Invalid pagination token", options?: { cause?: unknown }) {
    super(message, {
      status: 400,
      code: "INVALID_CURSOR",
      cause: options?.cause,
    })
    this.name = "InvalidCursorError"
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string) {
    super(message, {
      status: 403,
      code: "FORBIDDEN",
    })
    this.name = "ForbiddenError"
  }
}

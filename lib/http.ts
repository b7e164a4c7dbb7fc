export class HttpError extends Error {
  readonly status: number

  constructor(status: number, message: string) {
    super(message)
    this.name = new.target.name
    this.status = status
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad request') {
    super(400, message)
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'You need to sign in first.') {
    super(401, message)
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Administrator access is required.') {
    super(403, message)
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message)
  }
}

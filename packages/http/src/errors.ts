export class HttpException extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpException";
  }
}

export class BadRequestException extends HttpException {
  constructor(message = "Bad Request", details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestException";
  }
}

export class NotFoundException extends HttpException {
  constructor(message = "Not Found", details?: unknown) {
    super(404, message, details);
    this.name = "NotFoundException";
  }
}

/** `request`, `response` or a request resolver was used while no request is being handled. */
export class RequestScopeError extends Error {
  constructor(what: string) {
    super(`${what} is only available while a request is being handled`);
    this.name = "RequestScopeError";
  }
}

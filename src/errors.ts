import { isRecord } from "./utils/helpers";

/** Base class for every error thrown by this library */
export class GuildedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An operation on the client was used incorrectly */
export class ClientError extends GuildedError {}

/** A payload did not match the shape the library expects */
export class InvalidDataError extends GuildedError {}

/** The gateway could not be reached or kept alive */
export class GatewayError extends GuildedError {}

/** The gateway refused the handshake because of the credentials */
export class AuthenticationError extends GatewayError {
  constructor(readonly status: number) {
    super(`The gateway rejected the provided credentials (HTTP ${status})`);
  }
}

/** A user-registered handler threw while processing an event */
export class HandlerError extends GuildedError {
  constructor(
    readonly event: string,
    cause: unknown
  ) {
    super(
      `Handler for "${event}" threw: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

/** A non-ok response was returned by the REST API */
export class HTTPError extends GuildedError {
  readonly status: number;
  readonly code: string;
  readonly response: unknown;

  constructor(status: number, data: unknown) {
    let message: string;
    let code: string;
    if (isRecord(data)) {
      message =
        typeof data.message === "string" ? data.message : JSON.stringify(data);
      code = typeof data.code === "string" ? data.code : "UnknownCode";
    } else {
      message = String(data ?? "");
      code = "";
    }

    super(`${status} (${code}): ${message}`);
    this.status = status;
    this.code = code;
    this.response = data;
  }
}

export class BadRequestError extends HTTPError {}

export class ForbiddenError extends HTTPError {}

export class NotFoundError extends HTTPError {}

export class TooManyRequestsError extends HTTPError {}

export class ServerError extends HTTPError {}

export const httpErrorFor = (status: number, data: unknown): HTTPError => {
  switch (status) {
    case 400:
      return new BadRequestError(status, data);
    case 403:
      return new ForbiddenError(status, data);
    case 404:
      return new NotFoundError(status, data);
    case 429:
      return new TooManyRequestsError(status, data);
    default:
      return status >= 500
        ? new ServerError(status, data)
        : new HTTPError(status, data);
  }
};

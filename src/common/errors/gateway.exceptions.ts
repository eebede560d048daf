import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  UnauthorizedException,
} from '@nestjs/common';

/**
 * The caller did not send enough transport metadata to be fingerprinted.
 * Recoverable by resending with the headers.
 */
export class MissingClientContextException extends BadRequestException {}

/** 401: missing or invalid subject, deleted or locked account, internal fault. */
export class AuthenticationFailureException extends UnauthorizedException {}

/** 403: rendered without a body so role names never leak. */
export class AuthorizationDeniedException extends ForbiddenException {
  constructor() {
    super();
  }
}

export class RateLimitExceededException extends HttpException {
  constructor(
    message: string,
    readonly retryAfterSeconds: number,
  ) {
    super(message, HttpStatus.TOO_MANY_REQUESTS);
  }
}

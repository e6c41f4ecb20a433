import {
  BadRequestException,
  ForbiddenException,
  InternalServerErrorException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';

export class AuthenticationFailureError extends UnauthorizedException {
  constructor() {
    super('authentication failure');
  }
}

/** The requested key role has no entry in the key cache. */
export class NoKeyError extends ServiceUnavailableException {
  constructor(role?: string) {
    super(role ? `no key cached for ${role}` : 'no key cached');
  }
}

/** A cached key is present but is not of the type its role requires. */
export class BadKeyError extends InternalServerErrorException {
  constructor(role?: string) {
    super(role ? `cached key for ${role} has the wrong type` : 'bad key');
  }
}

export class BadRequestError extends BadRequestException {
  constructor() {
    super('missing consent challenge');
  }
}

export class ChallengeExpiredError extends ForbiddenException {
  constructor() {
    super('consent challenge expired');
  }
}

export class BadChallengeCookieError extends BadRequestException {
  constructor() {
    super('bad challenge cookie');
  }
}

export class UnexpectedSigningMethodError extends BadRequestException {
  constructor(alg: unknown) {
    super(`unexpected signing method: ${String(alg)}`);
  }
}

export class MalformedChallengeError extends BadRequestException {
  constructor(detail: string) {
    super(`malformed consent challenge: ${detail}`);
  }
}

export class NotConnectedError extends ServiceUnavailableException {
  constructor() {
    super('not connected to the authorization server');
  }
}

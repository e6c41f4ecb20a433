import { BadRequestException } from '@nestjs/common';
import { SignJWT } from 'jose';
import type { KeyObject } from 'node:crypto';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ChallengeExpiredError } from './errors';

/** Name under which a pending challenge is kept in the session store. */
export const CHALLENGE_COOKIE_NAME = 'idp_challenge';

/**
 * What a Challenge needs from the identity provider after it is built.
 * Held as a plain reference; the provider outlives every challenge.
 */
export interface ConsentKeySource {
  getConsentKey(): KeyObject;
}

export interface ChallengeRecord {
  client: string;
  redirect: string;
  user: string;
  scopes: string[];
  /** Epoch milliseconds. */
  expires: number;
}

export const challengeRecordSchema = z.object({
  client: z.string(),
  redirect: z.string(),
  user: z.string(),
  scopes: z.array(z.string()),
  expires: z.number().int(),
});

export interface ChallengeInit {
  client: string;
  redirect: string;
  user: string;
  scopes: readonly string[];
  expires: Date;
}

/** A pending consent decision for one client, redirect target and user. */
export class Challenge {
  readonly client: string;
  readonly redirect: string;
  readonly user: string;
  readonly scopes: readonly string[];
  readonly expires: Date;

  constructor(
    init: ChallengeInit,
    private readonly keys: ConsentKeySource,
    now: number = Date.now()
  ) {
    if (init.expires.getTime() <= now) {
      throw new ChallengeExpiredError();
    }

    this.client = init.client;
    this.redirect = init.redirect;
    this.user = init.user;
    this.scopes = Object.freeze([...init.scopes]);
    this.expires = new Date(init.expires.getTime());
  }

  static fromRecord(
    record: ChallengeRecord,
    keys: ConsentKeySource,
    now?: number
  ): Challenge {
    return new Challenge(
      { ...record, expires: new Date(record.expires) },
      keys,
      now
    );
  }

  isExpired(now: number = Date.now()): boolean {
    return this.expires.getTime() <= now;
  }

  toRecord(): ChallengeRecord {
    return {
      client: this.client,
      redirect: this.redirect,
      user: this.user,
      scopes: [...this.scopes],
      expires: this.expires.getTime(),
    };
  }

  /**
   * Grants the given subset of the requested scopes and returns the URL the
   * user agent must be sent back to, carrying the signed consent token.
   */
  async grantAccess(scopes: readonly string[]): Promise<string> {
    if (this.isExpired()) {
      throw new ChallengeExpiredError();
    }

    const unrequested = scopes.filter(scope => !this.scopes.includes(scope));
    if (unrequested.length > 0) {
      throw new BadRequestException(
        `scopes were not requested: ${unrequested.join(', ')}`
      );
    }

    const consent = await new SignJWT({ scp: [...scopes] })
      .setProtectedHeader({ alg: 'RS256' })
      .setJti(randomUUID())
      .setAudience(this.client)
      .setSubject(this.user)
      .setIssuedAt()
      .setExpirationTime(Math.floor(this.expires.getTime() / 1000))
      .sign(this.keys.getConsentKey());

    const url = new URL(this.redirect);
    url.searchParams.set('consent', consent);
    return url.toString();
  }

  grantAccessToAll(): Promise<string> {
    return this.grantAccess(this.scopes);
  }
}

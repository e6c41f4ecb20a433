import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { KeyObject } from 'node:crypto';
import { IdpConfig } from '../config/idp.config';
import {
  ConsentRequest,
  ConsentResponse,
  formValue,
} from '../http/challenge-store';
import { KeyFetcher } from '../hydra/key-fetcher';
import { TrustBootstrap, TrustSession } from '../hydra/trust-bootstrap';
import { KEY_LOCATIONS, KeyRole } from '../types/key-role.type';
import {
  CHALLENGE_COOKIE_NAME,
  Challenge,
  ChallengeRecord,
  ConsentKeySource,
  challengeRecordSchema,
} from './challenge';
import { ChallengeCodec, VerificationKeySource } from './challenge.codec';
import {
  BadChallengeCookieError,
  BadKeyError,
  ChallengeExpiredError,
  NoKeyError,
  NotConnectedError,
} from './errors';
import { KeyCache } from './key-cache';
import { RoleKeyFetcher } from './key-refresher';

/**
 * Identity provider side of the consent flow.
 *
 * `connect()` must succeed before challenges can be verified: it
 * authenticates against the authorization server and primes the key cache
 * with the challenge verification key and the consent signing key.
 */
@Injectable()
export class IdentityProviderService
  implements
    VerificationKeySource,
    ConsentKeySource,
    RoleKeyFetcher,
    OnModuleInit,
    OnModuleDestroy
{
  private readonly logger = new Logger(IdentityProviderService.name);
  private readonly codec: ChallengeCodec;
  private session: TrustSession | null = null;

  constructor(
    private readonly config: IdpConfig,
    private readonly cache: KeyCache,
    private readonly trust: TrustBootstrap,
    private readonly fetcher: KeyFetcher
  ) {
    this.codec = new ChallengeCodec(this);
  }

  async onModuleInit() {
    try {
      await this.connect();
    } catch (error) {
      this.logger.error(
        `❌ Failed to connect to ${this.config.hydraAddress}`,
        error instanceof Error ? error.stack : String(error)
      );
      throw error;
    }
  }

  onModuleDestroy() {
    this.close();
  }

  /**
   * Replaces the trust session and re-primes both keys. Until this resolves
   * the service reports not ready, and after a failure it stays that way.
   */
  async connect(): Promise<void> {
    this.session = null;
    this.cache.flush();

    this.session = await this.trust.login(this.config);

    const verificationKey = await this.fetchKey(KeyRole.VerificationKey);
    this.cache.set(KeyRole.VerificationKey, verificationKey);

    const consentKey = await this.fetchKey(KeyRole.ConsentSigningKey);
    this.cache.set(KeyRole.ConsentSigningKey, consentKey);

    this.logger.log(`✓ Connected to ${this.config.hydraAddress}`);
  }

  isReady(): boolean {
    return (
      this.session !== null &&
      this.cache.has(KeyRole.VerificationKey) &&
      this.cache.has(KeyRole.ConsentSigningKey)
    );
  }

  async fetchKey(role: KeyRole): Promise<KeyObject> {
    if (!this.session) {
      throw new NotConnectedError();
    }
    const { set, kind } = KEY_LOCATIONS[role];
    return this.fetcher.fetch(this.session.http, set, kind);
  }

  getVerificationKey(): KeyObject {
    const key = this.cache.get(KeyRole.VerificationKey);
    if (!key) {
      throw new NoKeyError(KeyRole.VerificationKey);
    }
    if (key.type !== 'public') {
      throw new BadKeyError(KeyRole.VerificationKey);
    }
    return key;
  }

  getConsentKey(): KeyObject {
    const key = this.cache.get(KeyRole.ConsentSigningKey);
    if (!key) {
      throw new NoKeyError(KeyRole.ConsentSigningKey);
    }
    if (key.type !== 'private') {
      throw new BadKeyError(KeyRole.ConsentSigningKey);
    }
    return key;
  }

  /**
   * Verifies the `challenge` form value of a consent request and binds it to
   * `user`, whose identity was established before this call.
   */
  async newChallenge(req: ConsentRequest, user: string): Promise<Challenge> {
    const claims = await this.codec.decode(formValue(req, 'challenge'));

    return new Challenge(
      {
        client: claims.aud,
        redirect: claims.redir,
        scopes: claims.scp,
        user,
        expires: new Date(claims.exp * 1000),
      },
      this
    );
  }

  /** Reads back the challenge stored by {@link saveChallenge}. */
  async getChallenge(req: ConsentRequest): Promise<Challenge> {
    const value = await this.config.challengeStore.get(
      req,
      CHALLENGE_COOKIE_NAME
    );

    let record: ChallengeRecord;
    if (value instanceof Challenge) {
      record = value.toRecord();
    } else {
      const parsed = challengeRecordSchema.safeParse(value);
      if (!parsed.success) {
        throw new BadChallengeCookieError();
      }
      record = parsed.data;
    }

    const now = Date.now();
    if (record.expires <= now) {
      throw new ChallengeExpiredError();
    }
    return Challenge.fromRecord(record, this, now);
  }

  async saveChallenge(
    challenge: Challenge,
    req: ConsentRequest,
    res: ConsentResponse
  ): Promise<void> {
    await this.config.challengeStore.set(
      req,
      res,
      CHALLENGE_COOKIE_NAME,
      challenge.toRecord(),
      challenge.expires
    );
  }

  async clearChallenge(
    req: ConsentRequest,
    res: ConsentResponse
  ): Promise<void> {
    await this.config.challengeStore.delete(req, res, CHALLENGE_COOKIE_NAME);
  }

  close() {
    this.session = null;
    this.cache.flush();
    this.logger.log('Identity provider closed');
  }
}

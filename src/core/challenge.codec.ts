import { errors, jwtVerify } from 'jose';
import type { KeyObject } from 'node:crypto';
import { z } from 'zod';
import {
  BadRequestError,
  ChallengeExpiredError,
  MalformedChallengeError,
  UnexpectedSigningMethodError,
} from './errors';

/** RSA signature schemes a consent challenge may be signed with. */
export const CHALLENGE_ALGORITHMS = ['RS256', 'RS384', 'RS512'] as const;

export interface VerificationKeySource {
  getVerificationKey(): KeyObject;
}

// latest instant a Date can hold, in seconds
const MAX_EXPIRY_SECONDS = 8.64e9;

const challengeClaimsSchema = z.object({
  aud: z.string(),
  redir: z.string(),
  scp: z.array(z.string()),
  exp: z.number().max(MAX_EXPIRY_SECONDS),
});

export type ChallengeClaims = z.infer<typeof challengeClaimsSchema>;

function isChallengeAlgorithm(alg: unknown): boolean {
  return CHALLENGE_ALGORITHMS.some(allowed => allowed === alg);
}

/**
 * Verifies consent challenge tokens issued by the authorization server.
 */
export class ChallengeCodec {
  constructor(
    private readonly keys: VerificationKeySource,
    private readonly now: () => number = Date.now
  ) {}

  async decode(token: string | undefined): Promise<ChallengeClaims> {
    if (!token) {
      throw new BadRequestError();
    }

    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(
        token,
        header => {
          if (!isChallengeAlgorithm(header.alg)) {
            throw new UnexpectedSigningMethodError(header.alg);
          }
          return this.keys.getVerificationKey();
        },
        { currentDate: new Date(this.now()) }
      ));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new ChallengeExpiredError();
      }
      throw error;
    }

    const parsed = challengeClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'claims'}: ${issue.message}`)
        .join('; ');
      throw new MalformedChallengeError(detail);
    }

    // exp is seconds; the token must still be valid strictly after now
    if (parsed.data.exp * 1000 <= this.now()) {
      throw new ChallengeExpiredError();
    }
    return parsed.data;
  }
}

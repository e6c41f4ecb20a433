import { Injectable } from '@nestjs/common';
import type { Response } from 'express';
import type { ConsentRequest } from '../http/challenge-store';

export type AuthFailureResponse = Pick<Response, 'setHeader' | 'status'>;

/**
 * Alternate way of establishing who the user is before a challenge is bound
 * to them.
 */
@Injectable()
export abstract class AuthProvider {
  /** Resolves to the authenticated user or rejects with `AuthenticationFailureError`. */
  abstract check(req: ConsentRequest): Promise<string>;
  abstract respond(res: AuthFailureResponse): void;
}

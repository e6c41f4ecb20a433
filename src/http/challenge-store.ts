import type { Request, Response } from 'express';

export type ConsentRequest = Pick<Request, 'query' | 'body' | 'headers'>;
export type ConsentResponse = Pick<Response, 'cookie' | 'clearCookie'>;

/**
 * Session-backed key-value store holding the pending consent challenge.
 * Implementations decide how the session is found (usually a cookie) and
 * must drop values past their expiry.
 */
export abstract class ChallengeStore {
  abstract get(req: ConsentRequest, name: string): Promise<unknown>;
  abstract set(
    req: ConsentRequest,
    res: ConsentResponse,
    name: string,
    value: unknown,
    expires: Date
  ): Promise<void>;
  abstract delete(
    req: ConsentRequest,
    res: ConsentResponse,
    name: string
  ): Promise<void>;
}

/** First string value of a form field, looking at the body before the query. */
export function formValue(req: ConsentRequest, name: string): string | undefined {
  const fromBody: unknown =
    typeof req.body === 'object' && req.body !== null
      ? Reflect.get(req.body, name)
      : undefined;
  const fromQuery: unknown = req.query[name];

  for (const candidate of [fromBody, fromQuery]) {
    const value = Array.isArray(candidate) ? candidate[0] : candidate;
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return undefined;
}

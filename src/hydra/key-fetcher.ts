import { Injectable } from '@nestjs/common';
import type { AxiosInstance } from 'axios';
import { importJWK } from 'jose';
import { KeyObject } from 'node:crypto';
import { z } from 'zod';
import { KeyKind } from '../types/key-role.type';

// RSA, EC and oct members; anything else in a published key is dropped
const jwkSchema = z.object({
  kty: z.string(),
  alg: z.string().optional(),
  kid: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  d: z.string().optional(),
  p: z.string().optional(),
  q: z.string().optional(),
  dp: z.string().optional(),
  dq: z.string().optional(),
  qi: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  k: z.string().optional(),
});

const keySetSchema = z.object({
  keys: z.array(jwkSchema),
});

/** Reads key material from the authorization server's key-publishing endpoint. */
@Injectable()
export class KeyFetcher {
  async fetch(
    http: AxiosInstance,
    set: string,
    kind: KeyKind
  ): Promise<KeyObject> {
    const res = await http.get<unknown>(
      `/keys/${encodeURIComponent(set)}/${kind}`
    );

    const { keys } = keySetSchema.parse(res.data);
    const [jwk] = keys;
    if (!jwk) {
      throw new Error(`key set ${set}/${kind} is empty`);
    }

    const key = await importJWK(jwk, jwk.alg ?? 'RS256');
    if (!(key instanceof KeyObject)) {
      throw new Error(`key set ${set}/${kind} holds a symmetric key`);
    }
    if (key.type !== kind) {
      throw new Error(`key set ${set}/${kind} returned a ${key.type} key`);
    }
    return key;
  }
}

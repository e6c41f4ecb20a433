import { Injectable } from '@nestjs/common';
import bcrypt from 'bcrypt';
import { randomUUID } from 'node:crypto';
import { AuthenticationFailureError } from '../core/errors';
import type { ConsentRequest } from '../http/challenge-store';
import { AuthFailureResponse, AuthProvider } from './auth-provider';
import { Htpasswd } from './htpasswd';

interface BasicCredentials {
  user: string;
  password: string;
}

function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const [scheme, encoded] = header.split(' ', 2);
  if (scheme?.toLowerCase() !== 'basic' || !encoded) return null;

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;

  return {
    user: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

/**
 * HTTP Basic authentication against bcrypt hashes in an htpasswd file.
 */
@Injectable()
export class BasicAuthProvider extends AuthProvider {
  constructor(
    private readonly htpasswd: Htpasswd,
    readonly realm: string,
    // compared against for unknown users so both paths cost one bcrypt round
    private readonly decoyHash: string
  ) {
    super();
  }

  static async create(
    htpasswdFileName: string,
    realm: string
  ): Promise<BasicAuthProvider> {
    const htpasswd = await Htpasswd.load(htpasswdFileName);
    const decoyHash = await bcrypt.hash(randomUUID(), 10);
    return new BasicAuthProvider(htpasswd, realm, decoyHash);
  }

  async check(req: ConsentRequest): Promise<string> {
    const credentials = parseBasicAuth(req.headers.authorization);
    if (!credentials) {
      throw new AuthenticationFailureError();
    }

    const hash = this.htpasswd.get(credentials.user);
    const matches = await bcrypt.compare(
      credentials.password,
      hash ?? this.decoyHash
    );
    if (!hash || !matches) {
      throw new AuthenticationFailureError();
    }
    return credentials.user;
  }

  respond(res: AuthFailureResponse) {
    res.setHeader('WWW-Authenticate', `Basic realm=${JSON.stringify(this.realm)}`);
    res.status(401).send('authorization failed');
  }
}

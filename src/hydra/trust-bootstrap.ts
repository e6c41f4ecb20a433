import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { Agent } from 'node:https';
import { z } from 'zod';

export const TRUST_SCOPES = ['core', 'hydra.keys.get'] as const;

// refresh a little before the server-side expiry
const EXPIRY_DELTA_MS = 10_000;

export interface TrustOptions {
  clientId: string;
  clientSecret: string;
  /** Base address of the authorization server, without a trailing slash. */
  hydraAddress: string;
  /** Verify the authorization server's TLS certificate. */
  tlsVerify: boolean;
  requestTimeout: number;
}

export interface AccessToken {
  accessToken: string;
  tokenType: string;
  expiresAt?: number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('bearer'),
  expires_in: z.coerce.number().positive().optional(),
});

/**
 * Client-credentials token source. Caches the current token and shares one
 * in-flight exchange between concurrent callers.
 */
export class ClientCredentialsTokenSource {
  private current: AccessToken | null = null;
  private pending: Promise<AccessToken> | null = null;

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: TrustOptions,
    private readonly now: () => number = Date.now
  ) {}

  async token(): Promise<AccessToken> {
    if (this.current && this.isFresh(this.current)) {
      return this.current;
    }
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private isFresh(token: AccessToken): boolean {
    return (
      token.expiresAt === undefined ||
      token.expiresAt - EXPIRY_DELTA_MS > this.now()
    );
  }

  private async exchange(): Promise<AccessToken> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      scope: TRUST_SCOPES.join(' '),
    });

    const res = await this.http.post<unknown>(
      `${this.options.hydraAddress}/oauth2/token`,
      form.toString(),
      {
        auth: {
          username: this.options.clientId,
          password: this.options.clientSecret,
        },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }
    );

    const body = tokenResponseSchema.parse(res.data);
    this.current = {
      accessToken: body.access_token,
      tokenType: body.token_type,
      expiresAt:
        body.expires_in !== undefined
          ? this.now() + body.expires_in * 1000
          : undefined,
    };
    return this.current;
  }
}

/** Authenticated transport to the authorization server. */
export class TrustSession {
  constructor(
    readonly http: AxiosInstance,
    readonly tokens: ClientCredentialsTokenSource
  ) {}
}

@Injectable()
export class TrustBootstrap {
  private readonly logger = new Logger(TrustBootstrap.name);

  /**
   * Runs the client-credentials grant and returns a transport that attaches
   * the bearer token to every request. The first token is fetched eagerly so
   * bad credentials or an unreachable server fail here.
   */
  async login(options: TrustOptions): Promise<TrustSession> {
    if (!options.tlsVerify) {
      this.logger.warn(
        `TLS certificate verification is disabled for ${options.hydraAddress}`
      );
    }

    const httpsAgent = new Agent({ rejectUnauthorized: options.tlsVerify });
    const tokens = new ClientCredentialsTokenSource(
      axios.create({ httpsAgent, timeout: options.requestTimeout }),
      options
    );

    await tokens.token();

    const http = axios.create({
      baseURL: options.hydraAddress,
      httpsAgent,
      timeout: options.requestTimeout,
    });
    http.interceptors.request.use(async config => {
      const { accessToken } = await tokens.token();
      config.headers.set('Authorization', `Bearer ${accessToken}`);
      return config;
    });

    return new TrustSession(http, tokens);
  }
}

import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import { IdpConfig, loadIdpConfig } from './config/idp.config';
import { IdentityProviderService } from './core/identity-provider.service';
import { KeyCache } from './core/key-cache';
import { KeyRefresher } from './core/key-refresher';
import { ChallengeStore } from './http/challenge-store';
import { KeyFetcher } from './hydra/key-fetcher';
import { TrustBootstrap } from './hydra/trust-bootstrap';
import { AuthProvider } from './providers/auth-provider';

export const IDP_CONFIG = 'IDP_CONFIG';

export interface IdentityProviderModuleOptions {
  challengeStore: ChallengeStore;
  /** Settings to use instead of the IDP_* environment variables. */
  config?: Omit<IdpConfig, 'challengeStore'>;
  authProvider?: AuthProvider;
}

@Global()
@Module({})
export class IdentityProviderModule {
  static forRoot(opts: IdentityProviderModuleOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: IDP_CONFIG,
        useFactory: (): IdpConfig =>
          opts.config
            ? { ...opts.config, challengeStore: opts.challengeStore }
            : loadIdpConfig(new ConfigService(), opts.challengeStore),
      },
      { provide: ChallengeStore, useValue: opts.challengeStore },
      TrustBootstrap,
      KeyFetcher,
      {
        provide: KeyCache,
        useFactory: (config: IdpConfig, events: EventEmitter2) =>
          new KeyCache(
            {
              defaultTtl: config.keyCacheExpiration,
              cleanupInterval: config.keyCacheCleanupInterval,
            },
            events
          ),
        inject: [IDP_CONFIG, EventEmitter2],
      },
      {
        provide: IdentityProviderService,
        useFactory: (
          config: IdpConfig,
          cache: KeyCache,
          trust: TrustBootstrap,
          fetcher: KeyFetcher
        ) => new IdentityProviderService(config, cache, trust, fetcher),
        inject: [IDP_CONFIG, KeyCache, TrustBootstrap, KeyFetcher],
      },
      {
        provide: KeyRefresher,
        useFactory: (
          cache: KeyCache,
          idp: IdentityProviderService,
          events: EventEmitter2
        ) => new KeyRefresher(cache, idp, events),
        inject: [KeyCache, IdentityProviderService, EventEmitter2],
      },
    ];

    if (opts.authProvider) {
      providers.push({ provide: AuthProvider, useValue: opts.authProvider });
    }

    return {
      module: IdentityProviderModule,
      imports: [EventEmitterModule.forRoot()],
      providers,
      exports: [
        IdentityProviderService,
        KeyCache,
        ChallengeStore,
        ...(opts.authProvider ? [AuthProvider] : []),
      ],
    };
  }
}

import 'reflect-metadata';

export * from './module';
export * from './config/idp.config';
export * from './core/challenge';
export * from './core/challenge.codec';
export * from './core/errors';
export * from './core/identity-provider.service';
export * from './core/key-cache';
export * from './core/key-refresher';
export * from './http/challenge-store';
export * from './hydra/key-fetcher';
export * from './hydra/trust-bootstrap';
export * from './providers/auth-provider';
export * from './providers/basic-auth.provider';
export * from './providers/htpasswd';
export * from './types/key-role.type';

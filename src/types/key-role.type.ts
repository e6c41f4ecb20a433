export enum KeyRole {
  VerificationKey = 'VerifyPublic', // verifies incoming consent challenges
  ConsentSigningKey = 'ConsentPrivate', // signs outgoing consent responses
}

export type KeyKind = 'public' | 'private';

export interface KeyLocation {
  set: string;
  kind: KeyKind;
}

export const KEY_LOCATIONS: Record<KeyRole, KeyLocation> = {
  [KeyRole.VerificationKey]: { set: 'consent.challenge', kind: 'public' },
  [KeyRole.ConsentSigningKey]: { set: 'consent.endpoint', kind: 'private' },
};

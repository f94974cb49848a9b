import type { Credentials, EpochMs } from "../lib/types.js";

export function isAccessValid(credentials: Readonly<Credentials> | null, now: EpochMs): boolean {
  if (!credentials?.accessToken) {
    return false;
  }
  if (credentials.accessExpiresAt === undefined) {
    return true;
  }
  return now < credentials.accessExpiresAt;
}

export function isWithinRefreshWindow(
  credentials: Readonly<Credentials> | null,
  now: EpochMs,
  thresholdMs: number
): boolean {
  if (!credentials || credentials.accessExpiresAt === undefined) {
    return false;
  }
  if (!isAccessValid(credentials, now)) {
    return false;
  }
  return credentials.accessExpiresAt - now < thresholdMs;
}

export function isRefreshExpired(credentials: Readonly<Credentials>, now: EpochMs): boolean {
  return credentials.refreshExpiresAt !== undefined && now >= credentials.refreshExpiresAt;
}

/**
 * Holds the current credential set as a single frozen object.
 *
 * Writers swap the whole object, so a reader holding a snapshot always sees
 * one token together with the expiry that belongs to it.
 */
export class CredentialStore {
  private current: Readonly<Credentials> | null;

  constructor(initial?: Credentials) {
    this.current = initial ? Object.freeze({ ...initial }) : null;
  }

  snapshot(): Readonly<Credentials> | null {
    return this.current;
  }

  replace(next: Credentials | null): Readonly<Credentials> | null {
    this.current = next ? Object.freeze({ ...next }) : null;
    return this.current;
  }

  clear(): void {
    this.current = null;
  }
}

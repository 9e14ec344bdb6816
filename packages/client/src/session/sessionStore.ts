/**
 * Tokens and ids the client keeps between calls.
 *
 * Implement SessionStore to persist them elsewhere; the client only ever
 * goes through this interface.
 */

export const SESSION_KEYS = [
  "deviceToken",
  "deviceId",
  "userToken",
  "userId",
  "measurementId",
] as const;

export type SessionKey = (typeof SESSION_KEYS)[number];

export interface SessionStore {
  get(key: SessionKey): string | undefined;
  set(key: SessionKey, value: string): void;
  delete(key: SessionKey): void;
  clear(): void;
}

export class InMemorySessionStore implements SessionStore {
  private values: Map<SessionKey, string> = new Map();

  constructor(initial: Partial<Record<SessionKey, string>> = {}) {
    for (const key of SESSION_KEYS) {
      const value = initial[key];
      if (value) this.values.set(key, value);
    }
  }

  get(key: SessionKey): string | undefined {
    return this.values.get(key);
  }

  set(key: SessionKey, value: string): void {
    if (value === "") {
      this.values.delete(key);
    } else {
      this.values.set(key, value);
    }
  }

  delete(key: SessionKey): void {
    this.values.delete(key);
  }

  clear(): void {
    this.values.clear();
  }
}

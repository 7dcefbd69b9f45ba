/**
 * @fileoverview One-time OAuth state nonce store.
 *
 * Tracks short-lived `state` values issued by /connect so /callback can
 * reject forged or replayed redirects.
 */

import crypto from 'crypto';

/** How long a connect link stays valid. */
export const STATE_TTL_MS = 10 * 60 * 1000;

export class OAuthStateStore {
  private readonly map = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Create and register a fresh state value.
   */
  issue(ttlMs: number = STATE_TTL_MS): string {
    const state = crypto.randomBytes(16).toString('base64url');
    this.prune();
    this.map.set(state, this.now() + ttlMs);
    return state;
  }

  /**
   * Consume a state value. Returns false if missing/expired/already used.
   */
  consume(state: string): boolean {
    const trimmed = state.trim();
    if (!trimmed) return false;

    this.prune();
    const expiresAt = this.map.get(trimmed);
    this.map.delete(trimmed);
    return expiresAt !== undefined && expiresAt >= this.now();
  }

  clear(): void {
    this.map.clear();
  }

  private prune(): void {
    const now = this.now();
    for (const [state, expiresAt] of this.map.entries()) {
      if (expiresAt < now) {
        this.map.delete(state);
      }
    }
  }
}

let store: OAuthStateStore | null = null;

export function getOAuthStateStore(): OAuthStateStore {
  if (!store) {
    store = new OAuthStateStore();
  }
  return store;
}

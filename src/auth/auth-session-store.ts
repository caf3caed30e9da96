export type PendingAuthorization = {
  stateId: string;
  codeVerifier: string;
  redirectUri: string;
  createdAt: number;
};

export interface PendingAuthorizationStore {
  save(pending: PendingAuthorization): void;
  /** Returns and forgets the entry; each state can complete one exchange. */
  take(stateId: string): PendingAuthorization | null;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 64;

export class InMemoryPendingAuthorizationStore implements PendingAuthorizationStore {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, PendingAuthorization>();

  constructor(options: { ttlMs?: number; maxEntries?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? (() => Date.now());
  }

  save(pending: PendingAuthorization): void {
    this.prune();
    this.entries.set(pending.stateId, pending);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  take(stateId: string): PendingAuthorization | null {
    const pending = this.entries.get(stateId);
    if (!pending) {
      return null;
    }
    this.entries.delete(stateId);
    return this.isExpired(pending) ? null : pending;
  }

  private prune(): void {
    for (const [stateId, pending] of this.entries) {
      if (this.isExpired(pending)) {
        this.entries.delete(stateId);
      }
    }
  }

  private isExpired(pending: PendingAuthorization): boolean {
    return pending.createdAt + this.ttlMs <= this.now();
  }
}

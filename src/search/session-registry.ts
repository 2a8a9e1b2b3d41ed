/**
 * Per-requester bookkeeping: which activities are in flight and which
 * provider sessions were submitted but not yet confirmed deleted.
 */

import { RequesterBusyError } from "../utils/errors.js";

export type ActivityKind = "search" | "download";

/** Held for the duration of one activity; release is idempotent */
export interface RequesterLease {
  readonly requester: string;
  readonly kind: ActivityKind;
  release(): void;
}

interface RequesterEntry {
  active: Set<ActivityKind>;
  openSessions: Set<string>;
}

/**
 * Registry keyed by requester identity. Entries appear on first use and are
 * dropped once nothing is active and no provider session is left open.
 */
export class SessionRegistry {
  private entries = new Map<string, RequesterEntry>();
  private submitting = 0;

  /**
   * Claim the requester's slot for one activity kind.
   * @throws RequesterBusyError if the same kind is already in flight
   */
  acquire(requester: string, kind: ActivityKind): RequesterLease {
    const entry = this.entry(requester);
    if (entry.active.has(kind)) {
      throw new RequesterBusyError(requester, kind);
    }
    entry.active.add(kind);

    let released = false;
    return {
      requester,
      kind,
      release: () => {
        if (released) return;
        released = true;
        this.entries.get(requester)?.active.delete(kind);
        this.prune(requester);
      },
    };
  }

  isActive(requester: string, kind: ActivityKind): boolean {
    return this.entries.get(requester)?.active.has(kind) ?? false;
  }

  /** Remember a submitted provider session until it is deleted */
  trackSession(requester: string, sessionId: string): void {
    this.entry(requester).openSessions.add(sessionId);
  }

  /** Forget a session after the provider confirmed deletion */
  untrackSession(requester: string, sessionId: string): void {
    this.entries.get(requester)?.openSessions.delete(sessionId);
    this.prune(requester);
  }

  /** Sessions a previous run left behind */
  staleSessions(requester: string): string[] {
    return [...(this.entries.get(requester)?.openSessions ?? [])];
  }

  /**
   * Count a submission whose session id is not known yet.
   * @returns Marks the submission settled; idempotent
   */
  beginSubmission(): () => void {
    this.submitting++;
    let settled = false;
    return () => {
      if (settled) return;
      settled = true;
      this.submitting--;
    };
  }

  /**
   * Whether a session found on the provider belongs to no one here.
   * Nothing counts as leftover while a submission is in flight, since its
   * session may already exist on the provider.
   */
  isLeftover(sessionId: string): boolean {
    if (this.submitting > 0) return false;
    for (const entry of this.entries.values()) {
      if (entry.openSessions.has(sessionId)) return false;
    }
    return true;
  }

  /** Number of requesters with live state */
  size(): number {
    return this.entries.size;
  }

  private entry(requester: string): RequesterEntry {
    let entry = this.entries.get(requester);
    if (!entry) {
      entry = { active: new Set(), openSessions: new Set() };
      this.entries.set(requester, entry);
    }
    return entry;
  }

  private prune(requester: string): void {
    const entry = this.entries.get(requester);
    if (entry && entry.active.size === 0 && entry.openSessions.size === 0) {
      this.entries.delete(requester);
    }
  }
}

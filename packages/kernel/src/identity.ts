import { v4 as uuid } from "uuid";
import type {
  ParticipantIdentity,
  RespondContext,
  ResponseProvider,
  SequenceView,
} from "@tickweave/schemas";
import { hashValue } from "@tickweave/schemas";

/** Encodes both parts so that no two distinct identities share a key. */
export function identityKey(identity: ParticipantIdentity): string {
  return JSON.stringify([identity.session_id, identity.participant]);
}

export function sameIdentity(a: ParticipantIdentity, b: ParticipantIdentity): boolean {
  return a.session_id === b.session_id && a.participant === b.participant;
}

/**
 * Hands out one identity per independent session and refuses to let a
 * session reuse an identity that another session already claimed.
 */
export class IdentityGuard {
  private readonly claimed = new Set<string>();

  issue(participant: string): ParticipantIdentity {
    const identity: ParticipantIdentity = Object.freeze({ session_id: uuid(), participant });
    this.claimed.add(identity.session_id);
    return identity;
  }

  claim(identity: ParticipantIdentity): ParticipantIdentity {
    if (!identity.session_id || !identity.participant) {
      throw new Error("Participant identity needs both a session_id and a participant");
    }
    if (this.claimed.has(identity.session_id)) {
      throw new Error(
        `Identity ${identity.session_id}/${identity.participant} already belongs to another session; independent sessions need distinct identities`,
      );
    }
    this.claimed.add(identity.session_id);
    return Object.freeze({ session_id: identity.session_id, participant: identity.participant });
  }

  has(identity: ParticipantIdentity): boolean {
    return this.claimed.has(identity.session_id);
  }

  get size(): number {
    return this.claimed.size;
  }
}

/** Cache key for a response: identity first, then the exact history it saw. */
export function responseCacheKey<S>(identity: ParticipantIdentity, prefix: SequenceView<S>): string {
  return `${identityKey(identity)}@${prefix.lastIndex}:${hashValue(prefix.toArray())}`;
}

export interface ResponseCacheStats {
  hits: number;
  misses: number;
}

/**
 * Memoizes a pure responder. Because the key always includes the identity,
 * two sessions with the same opening history never share entries.
 * Only wrap pure responders: a live responder's output is not a function of its inputs.
 */
export class MemoizedResponder<S, R> implements ResponseProvider<S, R> {
  private readonly inner: ResponseProvider<S, R>;
  private readonly cache: Map<string, { response: R }>;
  private readonly counters: ResponseCacheStats = { hits: 0, misses: 0 };

  constructor(inner: ResponseProvider<S, R>, cache: Map<string, { response: R }> = new Map()) {
    this.inner = inner;
    this.cache = cache;
  }

  async respond(identity: ParticipantIdentity, prefix: SequenceView<S>, context: RespondContext): Promise<R> {
    const key = responseCacheKey(identity, prefix);
    const cached = this.cache.get(key);
    if (cached) {
      this.counters.hits++;
      return cached.response;
    }
    this.counters.misses++;
    const response = await this.inner.respond(identity, prefix, context);
    this.cache.set(key, { response });
    return response;
  }

  stats(): ResponseCacheStats {
    return { ...this.counters };
  }
}

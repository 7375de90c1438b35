// src/state/conversationStore.ts

export const EVENT_STEPS = ["title", "location", "type", "time"] as const;

export type EventStep = (typeof EVENT_STEPS)[number];

export type EventDraft = Partial<Record<EventStep, string>>;

export type ConversationState = {
  stepIndex: number;
  fields: EventDraft;
};

/**
 * Per-user dialogue state. Every operation is synchronous, so a read-modify-write
 * done through `update` cannot interleave with another update for the same user.
 * Swappable for a shared backend as long as `update` stays atomic per key.
 */
export interface SessionStore<S> {
  get(userId: number): S | undefined;
  set(userId: number, state: S): void;
  clear(userId: number): boolean;
  /** Applies `fn` to the current state; `null` clears, `undefined` leaves the state alone. */
  update<R>(userId: number, fn: (current: S | undefined) => { next: S | null | undefined; result: R }): R;
}

export function createMemorySessionStore<S>(): SessionStore<S> {
  const store = new Map<number, S>();

  return {
    get(userId) {
      return store.get(userId);
    },
    set(userId, state) {
      store.set(userId, state);
    },
    clear(userId) {
      return store.delete(userId);
    },
    update<R>(userId: number, fn: (current: S | undefined) => { next: S | null | undefined; result: R }): R {
      const { next, result } = fn(store.get(userId));
      if (next === null) store.delete(userId);
      else if (next !== undefined) store.set(userId, next);
      return result;
    },
  };
}

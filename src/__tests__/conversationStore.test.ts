import { createMemorySessionStore } from "../state/conversationStore";

describe("memory session store", () => {
  it("gets, sets and clears per user", () => {
    const sessions = createMemorySessionStore<string>();

    sessions.set(1, "a");
    sessions.set(2, "b");

    expect(sessions.get(1)).toBe("a");
    expect(sessions.clear(1)).toBe(true);
    expect(sessions.clear(1)).toBe(false);
    expect(sessions.get(1)).toBeUndefined();
    expect(sessions.get(2)).toBe("b");
  });

  it("applies update results: value sets, null clears, undefined keeps", () => {
    const sessions = createMemorySessionStore<number>();

    expect(sessions.update(1, (cur) => ({ next: (cur ?? 0) + 1, result: "set" }))).toBe("set");
    expect(sessions.get(1)).toBe(1);

    sessions.update(1, () => ({ next: undefined, result: null }));
    expect(sessions.get(1)).toBe(1);

    sessions.update(1, () => ({ next: null, result: null }));
    expect(sessions.get(1)).toBeUndefined();
  });
});

import { describe, it, expect } from "vitest";
import { SessionRegistry } from "../src/api/sessions.js";
import { TemplateCatalog } from "../src/style/catalog.js";
import { StyleConfigStore } from "../src/style/store.js";

const catalog = new TemplateCatalog();

function registry(options: { ttlMs?: number; maxSessions?: number } = {}) {
  let clock = 0;
  const sessions = new SessionRegistry({
    ttlMs: options.ttlMs ?? 1000,
    maxSessions: options.maxSessions ?? 10,
    now: () => clock,
  });
  return {
    sessions,
    advance(ms: number) {
      clock += ms;
    },
  };
}

describe("SessionRegistry", () => {
  it("returns the store a session was created with", () => {
    const { sessions } = registry();
    const store = new StyleConfigStore(catalog, "formal");
    const id = sessions.create(store);

    expect(sessions.get(id)).toBe(store);
    expect(sessions.get("missing")).toBeUndefined();
  });

  it("drops sessions idle for the TTL", () => {
    const { sessions, advance } = registry({ ttlMs: 1000 });
    const id = sessions.create(new StyleConfigStore(catalog));

    advance(999);
    expect(sessions.get(id)).toBeDefined();
    advance(1000);
    expect(sessions.get(id)).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  it("counts idle time from the last access", () => {
    const { sessions, advance } = registry({ ttlMs: 1000 });
    const busy = sessions.create(new StyleConfigStore(catalog));
    const idle = sessions.create(new StyleConfigStore(catalog));

    advance(600);
    sessions.get(busy);
    advance(600);

    expect(sessions.get(idle)).toBeUndefined();
    expect(sessions.get(busy)).toBeDefined();
  });

  it("evicts the least recently used session at capacity", () => {
    const { sessions, advance } = registry({ maxSessions: 2 });
    const first = sessions.create(new StyleConfigStore(catalog));
    advance(1);
    const second = sessions.create(new StyleConfigStore(catalog));
    advance(1);
    sessions.get(first);
    advance(1);
    const third = sessions.create(new StyleConfigStore(catalog));

    expect(sessions.size).toBe(2);
    expect(sessions.get(second)).toBeUndefined();
    expect(sessions.get(first)).toBeDefined();
    expect(sessions.get(third)).toBeDefined();
  });

  it("deletes sessions explicitly", () => {
    const { sessions } = registry();
    const id = sessions.create(new StyleConfigStore(catalog));

    expect(sessions.delete(id)).toBe(true);
    expect(sessions.delete(id)).toBe(false);
  });
});

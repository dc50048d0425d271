import { describe, it, expect } from "vitest";
import { SequenceStore, deepFreeze } from "./sequence-store.js";

function counted(n: number): SequenceStore<number> {
  const store = new SequenceStore<number>("state");
  for (let i = 0; i < n; i++) store.publish(i, i * 10);
  return store;
}

describe("SequenceStore", () => {
  it("publishes elements at consecutive indices", () => {
    const store = counted(3);
    expect(store.length).toBe(3);
    expect(store.lastIndex).toBe(2);
    expect(store.at(1)).toBe(10);
    expect(store.at(-1)).toBeUndefined();
    expect(store.at(3)).toBeUndefined();
    expect(store.latest()).toBe(20);
  });

  it("rejects publishing out of order", () => {
    const store = counted(2);
    expect(() => store.publish(3, 30)).toThrow("Cannot publish state[3]: next publishable index is 2");
    expect(() => store.publish(1, 99)).toThrow("Cannot publish state[1]: next publishable index is 2");
    expect(store.toArray()).toEqual([0, 10]);
  });

  it("deep-freezes published values", () => {
    const store = new SequenceStore<{ hero: { x: number } }>("state");
    const value = store.publish(0, { hero: { x: 1 } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.hero)).toBe(true);
    expect(() => {
      value.hero.x = 2;
    }).toThrow(TypeError);
  });

  it("leaves values mutable when freezing is off", () => {
    const store = new SequenceStore<{ x: number }>("response", { freeze: false });
    const value = store.publish(0, { x: 1 });
    expect(Object.isFrozen(value)).toBe(false);
  });

  it("adopts a seed as an already-published prefix", () => {
    const store = new SequenceStore<string>("response", { seed: ["a", "b"] });
    expect(store.length).toBe(2);
    store.publish(2, "c");
    expect(store.toArray()).toEqual(["a", "b", "c"]);
  });

  it("toArray returns a copy", () => {
    const store = counted(2);
    const copy = store.toArray();
    copy.push(99);
    expect(store.length).toBe(2);
  });
});

describe("prefix views", () => {
  it("are bounded at the requested end", () => {
    const view = counted(5).view({ end: 2 });
    expect(view.kind).toBe("state");
    expect(view.start).toBe(0);
    expect(view.lastIndex).toBe(2);
    expect(view.length).toBe(3);
    expect(view.at(2)).toBe(20);
    expect(view.at(3)).toBeUndefined();
    expect(view.latest()).toBe(20);
    expect(view.toArray()).toEqual([0, 10, 20]);
  });

  it("show only the trailing window", () => {
    const view = counted(5).view({ end: 4, window: 2 });
    expect(view.start).toBe(3);
    expect(view.length).toBe(2);
    expect(view.at(2)).toBeUndefined();
    expect(view.at(3)).toBe(30);
    expect(view.toArray()).toEqual([30, 40]);
  });

  it("clamp a window larger than the prefix", () => {
    const view = counted(2).view({ window: 10 });
    expect(view.start).toBe(0);
    expect(view.toArray()).toEqual([0, 10]);
  });

  it("do not see elements published after they were taken", () => {
    const store = counted(2);
    const view = store.view();
    store.publish(2, 20);
    expect(view.length).toBe(2);
    expect(view.latest()).toBe(10);
  });

  it("are iterable in index order", () => {
    expect([...counted(4).view({ end: 3, window: 3 })]).toEqual([10, 20, 30]);
  });

  it("of an empty store are empty", () => {
    const view = new SequenceStore<number>("state").view();
    expect(view.length).toBe(0);
    expect(view.lastIndex).toBe(-1);
    expect(view.latest()).toBeUndefined();
    expect(view.toArray()).toEqual([]);
  });
});

describe("deepFreeze", () => {
  it("freezes nested arrays and objects and passes primitives through", () => {
    const value = deepFreeze({ enemies: [{ lane: 1 }] });
    expect(Object.isFrozen(value.enemies)).toBe(true);
    expect(Object.isFrozen(value.enemies[0])).toBe(true);
    expect(deepFreeze(7)).toBe(7);
    expect(deepFreeze(null)).toBeNull();
  });
  it("leaves typed arrays inside a value writable", () => {
    const value = deepFreeze({ pos: Float64Array.of(1, 2), raw: new DataView(new ArrayBuffer(4)) });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.pos)).toBe(false);
    expect(Array.from(value.pos)).toEqual([1, 2]);
  });

  it("lets a store publish typed-array elements", () => {
    const store = new SequenceStore<Uint8Array>("state");
    expect(store.publish(0, Uint8Array.of(3, 4))).toEqual(Uint8Array.of(3, 4));
    expect(store.length).toBe(1);
  });
});

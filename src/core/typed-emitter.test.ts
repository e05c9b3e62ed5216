import { beforeEach, describe, expect, it } from "vitest";
import { TypedEventEmitter } from "./typed-emitter.js";

interface TickEvents {
  tick: { at: number };
  label: { text: string };
}

class TickEmitter extends TypedEventEmitter<TickEvents> {
  fire<K extends keyof TickEvents & string>(event: K, payload: TickEvents[K]): boolean {
    return this.emit(event, payload);
  }
}

describe("TypedEventEmitter", () => {
  let emitter: TickEmitter;

  beforeEach(() => {
    emitter = new TickEmitter();
  });

  it("delivers payloads to every listener of the event", () => {
    const seen: number[] = [];
    emitter.on("tick", ({ at }) => seen.push(at));
    emitter.on("tick", ({ at }) => seen.push(at * 10));

    emitter.fire("tick", { at: 1 });

    expect(seen).toEqual([1, 10]);
  });

  it("once listeners fire a single time", () => {
    const seen: string[] = [];
    emitter.once("label", ({ text }) => seen.push(text));

    emitter.fire("label", { text: "first" });
    emitter.fire("label", { text: "second" });

    expect(seen).toEqual(["first"]);
  });

  it("off removes only the given listener", () => {
    const seen: string[] = [];
    const drop = () => seen.push("dropped");
    emitter.on("tick", drop);
    emitter.on("tick", () => seen.push("kept"));

    emitter.off("tick", drop);
    emitter.fire("tick", { at: 0 });

    expect(seen).toEqual(["kept"]);
    expect(emitter.listenerCount("tick")).toBe(1);
  });

  it("keeps events independent", () => {
    const ticks: number[] = [];
    emitter.on("tick", ({ at }) => ticks.push(at));

    expect(emitter.fire("label", { text: "nobody listens" })).toBe(false);
    expect(emitter.fire("tick", { at: 5 })).toBe(true);
    expect(ticks).toEqual([5]);
  });

  it("returns this for chaining", () => {
    const listener = () => {};
    expect(emitter.on("tick", listener).off("tick", listener)).toBe(emitter);
  });
});

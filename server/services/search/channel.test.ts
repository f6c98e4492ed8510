import { describe, expect, it } from "vitest";
import { collect } from "../../test-utils/http";
import { Channel } from "./channel";

describe("Channel", () => {
  it("drains buffered values after close", async () => {
    const channel = new Channel<number>(2);
    expect(await channel.send(1)).toBe(true);
    expect(await channel.send(2)).toBe(true);
    channel.close();

    expect(await channel.send(3)).toBe(false);
    expect(await collect(channel)).toEqual([1, 2]);
  });

  it("holds producers while the buffer is full", async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);
    let accepted: boolean | undefined;
    const pending = channel.send(2).then((result) => {
      accepted = result;
    });

    await Promise.resolve();
    expect(accepted).toBeUndefined();
    expect(channel.size).toBe(1);

    expect(await channel.next()).toEqual({ value: 1, done: false });
    await pending;
    expect(accepted).toBe(true);
    expect(await channel.next()).toEqual({ value: 2, done: false });
  });

  it("hands a value straight to a waiting consumer", async () => {
    const channel = new Channel<string>(1);
    const next = channel.next();
    expect(await channel.send("a")).toBe(true);
    expect(await next).toEqual({ value: "a", done: false });
    expect(channel.size).toBe(0);
  });

  it("releases waiting consumers and producers on close", async () => {
    const waiting = new Channel<number>(1);
    const next = waiting.next();
    waiting.close();
    expect(await next).toEqual({ value: undefined, done: true });

    const full = new Channel<number>(1);
    await full.send(1);
    const blocked = full.send(2);
    full.close();
    expect(await blocked).toBe(false);
    expect(await collect(full)).toEqual([1]);
  });

  it("discards the buffer when iteration stops early", async () => {
    const channel = new Channel<number>(3);
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }

    expect(channel.isClosed).toBe(true);
    expect(channel.size).toBe(0);
  });

  it("rejects capacities below one", () => {
    expect(() => new Channel(0)).toThrow(RangeError);
    expect(() => new Channel(1.5)).toThrow(RangeError);
  });
});

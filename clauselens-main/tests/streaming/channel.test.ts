import { describe, it, expect } from "vitest";
import { Channel } from "../../src/streaming/channel.js";

describe("Channel", () => {
  it("should deliver values in order, then finish", async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await channel.take()).toEqual({ done: false, value: 1 });
    expect(await channel.take()).toEqual({ done: false, value: 2 });
    expect(await channel.take()).toEqual({ done: true, value: undefined });
    expect(await channel.take()).toEqual({ done: true, value: undefined });
  });

  it("should wake a waiting consumer", async () => {
    const channel = new Channel<string>();
    const pending = channel.take();
    channel.push("late");
    expect(await pending).toEqual({ done: false, value: "late" });
  });

  it("should rethrow a close error after draining", async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.close(new Error("producer failed"));

    expect(await channel.take()).toEqual({ done: false, value: 1 });
    await expect(channel.take()).rejects.toThrow("producer failed");
  });

  it("should drop buffered values on cancel", async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.cancel();

    expect(channel.push(2)).toBe(false);
    expect(channel.isClosed).toBe(true);
    expect(await channel.take()).toEqual({ done: true, value: undefined });
  });
});

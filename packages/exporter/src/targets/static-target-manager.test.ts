import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { StaticTargetManager } from "./static-target-manager.js";
import { FakeProbeEngine, FakeResolver, v4 } from "../test/fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Let every pending promise callback run */
function flush(): Promise<void> {
  return new Promise((r) => setImmediate(r));
}

let engine: FakeProbeEngine;
let resolver: FakeResolver;
let manager: StaticTargetManager;

beforeEach(() => {
  engine = new FakeProbeEngine();
  resolver = new FakeResolver();
});

afterEach(() => {
  manager?.stop();
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("StaticTargetManager", () => {
  it("registers every target on start, staggered by index", async () => {
    resolver
      .set("a.example", v4("192.0.2.1"))
      .set("b.example", v4("192.0.2.2"))
      .set("c.example", v4("192.0.2.3"));
    manager = new StaticTargetManager(["a.example", "b.example", "c.example"], engine, resolver);

    await manager.start();

    expect(engine.probes.get("a.example 192.0.2.1 4")?.delayMs).toBe(0);
    expect(engine.probes.get("b.example 192.0.2.2 4")?.delayMs).toBe(10);
    expect(engine.probes.get("c.example 192.0.2.3 4")?.delayMs).toBe(20);
  });

  it("skips targets that do not resolve at startup", async () => {
    resolver.set("a.example", v4("192.0.2.1"));
    manager = new StaticTargetManager(["missing.example", "a.example"], engine, resolver);

    await expect(manager.start()).resolves.toBeUndefined();
    expect(engine.identities).toEqual(["a.example 192.0.2.1 4"]);
  });

  it("follows an address change on refresh", async () => {
    resolver.set("example.com", v4("192.0.2.1"));
    manager = new StaticTargetManager(["example.com"], engine, resolver);
    await manager.start();

    resolver.set("example.com", v4("192.0.2.2"));
    await manager.refresh();

    expect(engine.identities).toEqual(["example.com 192.0.2.2 4"]);
  });

  it("keeps a target's addresses when its refresh lookup fails", async () => {
    resolver.set("a.example", v4("192.0.2.1")).set("b.example", v4("192.0.2.2"));
    manager = new StaticTargetManager(["a.example", "b.example"], engine, resolver);
    await manager.start();

    resolver.table.delete("a.example");
    resolver.set("b.example", v4("192.0.2.3"));
    await manager.refresh();

    expect(engine.identities).toEqual(["a.example 192.0.2.1 4", "b.example 192.0.2.3 4"]);
  });

  it("does not hold other targets back behind a slow lookup", async () => {
    resolver.set("slow.example", v4("192.0.2.1")).set("fast.example", v4("192.0.2.2"));
    manager = new StaticTargetManager(["slow.example", "fast.example"], engine, resolver);
    await manager.start();

    resolver.resolve.mockImplementation(async (host: string) => {
      if (host === "slow.example") return new Promise<never>(() => {});
      return [v4("192.0.2.3")];
    });
    void manager.refresh();
    await flush();

    expect(engine.identities).toEqual(["fast.example 192.0.2.3 4", "slow.example 192.0.2.1 4"]);
  });

  it("refreshes on the configured interval", async () => {
    vi.useFakeTimers();
    resolver.set("example.com", v4("192.0.2.1"));
    manager = new StaticTargetManager(["example.com"], engine, resolver, { refreshMs: 60_000 });
    const refresh = vi.spyOn(manager, "refresh").mockResolvedValue();

    await manager.start();
    expect(manager.isRunning).toBe(true);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(refresh).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(refresh).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(refresh).toHaveBeenCalledTimes(2);

    manager.stop();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(refresh).toHaveBeenCalledTimes(2);
  });

  it("does not start a refresh loop when the interval is 0", async () => {
    resolver.set("example.com", v4("192.0.2.1"));
    manager = new StaticTargetManager(["example.com"], engine, resolver, { refreshMs: 0 });

    await manager.start();

    expect(manager.isRunning).toBe(false);
  });

  it("knows which hosts are static", () => {
    manager = new StaticTargetManager(["example.com"], engine, resolver);

    expect(manager.has("example.com")).toBe(true);
    expect(manager.has("other.example")).toBe(false);
  });
});

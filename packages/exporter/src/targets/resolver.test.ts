import { describe, it, expect, vi, beforeEach } from "vitest";

// ---------------------------------------------------------------------------
// Mock node:dns/promises
// ---------------------------------------------------------------------------
const dns = vi.hoisted(() => ({
  lookup: vi.fn(),
  resolve4: vi.fn(),
  resolve6: vi.fn(),
  setServers: vi.fn(),
}));

vi.mock("node:dns/promises", () => ({
  lookup: dns.lookup,
  Resolver: class {
    setServers = dns.setServers;
    resolve4 = dns.resolve4;
    resolve6 = dns.resolve6;
  },
}));

// ---------------------------------------------------------------------------
import { DnsTargetResolver, nameserverAddress } from "./resolver.js";
import { ResolutionError } from "../errors.js";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("nameserverAddress", () => {
  it("appends the DNS port to IPv4 addresses", () => {
    expect(nameserverAddress("192.0.2.53")).toBe("192.0.2.53:53");
  });

  it("brackets IPv6 addresses", () => {
    expect(nameserverAddress("2001:db8::53")).toBe("[2001:db8::53]:53");
  });

  it("keeps an explicit port", () => {
    expect(nameserverAddress("192.0.2.53:5353")).toBe("192.0.2.53:5353");
  });
});

describe("DnsTargetResolver", () => {
  it("returns IP literals without a lookup", async () => {
    const resolver = new DnsTargetResolver();

    await expect(resolver.resolve("192.0.2.7")).resolves.toEqual([{ address: "192.0.2.7", family: 4 }]);
    await expect(resolver.resolve("2001:db8::7")).resolves.toEqual([{ address: "2001:db8::7", family: 6 }]);
    expect(dns.lookup).not.toHaveBeenCalled();
  });

  describe("system resolver", () => {
    it("returns every address in resolver order", async () => {
      dns.lookup.mockResolvedValue([
        { address: "2001:db8::1", family: 6 },
        { address: "192.0.2.1", family: 4 },
      ]);
      const resolver = new DnsTargetResolver();

      await expect(resolver.resolve("example.com")).resolves.toEqual([
        { address: "2001:db8::1", family: 6 },
        { address: "192.0.2.1", family: 4 },
      ]);
      expect(dns.lookup).toHaveBeenCalledWith("example.com", { all: true, verbatim: true });
      expect(dns.setServers).not.toHaveBeenCalled();
    });

    it("fails when nothing is returned", async () => {
      dns.lookup.mockResolvedValue([]);
      const resolver = new DnsTargetResolver();

      await expect(resolver.resolve("example.com")).rejects.toThrow("cannot resolve target example.com");
    });

    it("wraps lookup errors", async () => {
      dns.lookup.mockRejectedValue(new Error("getaddrinfo ENOTFOUND nope.invalid"));
      const resolver = new DnsTargetResolver();

      const err = await resolver.resolve("nope.invalid").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ResolutionError);
      expect((err as ResolutionError).message).toBe(
        "error resolving target nope.invalid: getaddrinfo ENOTFOUND nope.invalid",
      );
      expect((err as ResolutionError).host).toBe("nope.invalid");
    });
  });

  describe("pinned nameserver", () => {
    it("queries the configured server on port 53", async () => {
      dns.resolve4.mockResolvedValue(["192.0.2.1"]);
      dns.resolve6.mockResolvedValue(["2001:db8::1"]);
      const resolver = new DnsTargetResolver("192.0.2.53");

      await expect(resolver.resolve("example.com")).resolves.toEqual([
        { address: "192.0.2.1", family: 4 },
        { address: "2001:db8::1", family: 6 },
      ]);
      expect(dns.setServers).toHaveBeenCalledWith(["192.0.2.53:53"]);
      expect(dns.lookup).not.toHaveBeenCalled();
    });

    it("uses A records when AAAA fails", async () => {
      dns.resolve4.mockResolvedValue(["192.0.2.1"]);
      dns.resolve6.mockRejectedValue(new Error("queryAaaa ENODATA example.com"));
      const resolver = new DnsTargetResolver("192.0.2.53");

      await expect(resolver.resolve("example.com")).resolves.toEqual([{ address: "192.0.2.1", family: 4 }]);
    });

    it("fails when both queries fail", async () => {
      dns.resolve4.mockRejectedValue(new Error("queryA ESERVFAIL example.com"));
      dns.resolve6.mockRejectedValue(new Error("queryAaaa ESERVFAIL example.com"));
      const resolver = new DnsTargetResolver("192.0.2.53");

      await expect(resolver.resolve("example.com")).rejects.toThrow(
        "error resolving target example.com: queryA ESERVFAIL example.com",
      );
    });
  });
});

import { describe, it, expect } from "vitest";
import { parsePingSummary } from "./ping-output.js";

describe("parsePingSummary", () => {
  it("parses iputils output", () => {
    const stdout = [
      "PING 192.0.2.1 (192.0.2.1) 56(84) bytes of data.",
      "64 bytes from 192.0.2.1: icmp_seq=1 ttl=57 time=10.1 ms",
      "",
      "--- 192.0.2.1 ping statistics ---",
      "10 packets transmitted, 9 received, 10% packet loss, time 9012ms",
      "rtt min/avg/max/mdev = 10.125/15.5/20.75/2.25 ms",
    ].join("\n");

    expect(parsePingSummary(stdout)).toEqual({
      packetsSent: 10,
      packetsLost: 1,
      best: 10.125,
      mean: 15.5,
      worst: 20.75,
      stddev: 2.25,
    });
  });

  it("parses BSD/busybox wording", () => {
    const stdout = [
      "--- 192.0.2.1 ping statistics ---",
      "3 packets transmitted, 3 packets received, 0% packet loss",
      "round-trip min/avg/max/stddev = 1.5/2.5/3.5/0.5 ms",
    ].join("\n");

    expect(parsePingSummary(stdout)).toEqual({
      packetsSent: 3,
      packetsLost: 0,
      best: 1.5,
      mean: 2.5,
      worst: 3.5,
      stddev: 0.5,
    });
  });

  it("reports full loss without RTT statistics", () => {
    const stdout = [
      "--- 192.0.2.1 ping statistics ---",
      "5 packets transmitted, 0 received, 100% packet loss, time 4096ms",
    ].join("\n");

    expect(parsePingSummary(stdout)).toEqual({
      packetsSent: 5,
      packetsLost: 5,
      best: 0,
      mean: 0,
      worst: 0,
      stddev: 0,
    });
  });

  it("returns null without a summary", () => {
    expect(parsePingSummary("ping: unknown host")).toBeNull();
    expect(parsePingSummary("")).toBeNull();
  });
});

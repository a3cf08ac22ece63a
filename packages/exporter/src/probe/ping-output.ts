/**
 * Parser for the summary `ping(8)` prints after a batch.
 *
 * Handles iputils and BSD/busybox wording:
 *   10 packets transmitted, 9 received, 10% packet loss, time 9012ms
 *   rtt min/avg/max/mdev = 10.123/15.456/20.789/2.345 ms
 *   round-trip min/avg/max/stddev = 10.123/15.456/20.789/2.345 ms
 */

import type { ProbeMetrics } from "@ping-exporter/shared";

const PACKETS_RE = /(\d+) packets transmitted, (\d+) (?:packets )?received/;

const RTT_RE =
  /(?:rtt|round-trip) min\/avg\/max\/(?:mdev|stddev) = ([\d.]+)\/([\d.]+)\/([\d.]+)\/([\d.]+) ms/;

/**
 * Extract packet counts and RTT statistics from ping output.
 * Returns null when the output has no packet summary at all.
 * Without replies there is no RTT line and the statistics stay 0.
 */
export function parsePingSummary(stdout: string): ProbeMetrics | null {
  const packets = PACKETS_RE.exec(stdout);
  if (!packets) return null;

  const sent = parseInt(packets[1], 10);
  const received = parseInt(packets[2], 10);

  const metrics: ProbeMetrics = {
    packetsSent: sent,
    packetsLost: Math.max(0, sent - received),
    best: 0,
    worst: 0,
    mean: 0,
    stddev: 0,
  };

  const rtt = RTT_RE.exec(stdout);
  if (rtt) {
    metrics.best = parseFloat(rtt[1]);
    metrics.mean = parseFloat(rtt[2]);
    metrics.worst = parseFloat(rtt[3]);
    metrics.stddev = parseFloat(rtt[4]);
  }

  return metrics;
}

/**
 * Timeout profiles per network-quality tier
 */

import type { NetworkQuality, TimeoutProfile } from "../../types";

const SECOND = 1000;

export const TIMEOUTS_GOOD: TimeoutProfile = {
  ioTimeoutMs: 45 * SECOND,
  cmdTimeoutMs: 30 * SECOND,
  probeTimeoutMs: 10 * SECOND,
};

export const TIMEOUTS_POOR: TimeoutProfile = {
  ioTimeoutMs: 3 * TIMEOUTS_GOOD.ioTimeoutMs,
  cmdTimeoutMs: 3 * TIMEOUTS_GOOD.cmdTimeoutMs,
  probeTimeoutMs: 3 * TIMEOUTS_GOOD.probeTimeoutMs,
};

// Long but finite: a run must always terminate, even on a mount that never answers
export const TIMEOUTS_TERRIBLE: TimeoutProfile = {
  ioTimeoutMs: 3600 * SECOND,
  cmdTimeoutMs: 1800 * SECOND,
  probeTimeoutMs: 600 * SECOND,
};

const PROFILES: Record<NetworkQuality, TimeoutProfile> = {
  good: TIMEOUTS_GOOD,
  poor: TIMEOUTS_POOR,
  terrible: TIMEOUTS_TERRIBLE,
};

export function selectTimeoutProfile(quality: NetworkQuality): TimeoutProfile {
  return PROFILES[quality];
}

/**
 * Machine metadata recorded alongside benchmark results
 */

import { arch, cpus, hostname, platform, release, totalmem } from "node:os";
import type { MachineInfo } from "./types.js";

export function getMachineInfo(now: Date = new Date()): MachineInfo {
  const cpuInfo = cpus();
  const cpu = cpuInfo[0];

  return {
    hostname: hostname(),
    platform: platform(),
    arch: arch(),
    osRelease: release(),
    cpuModel: cpu?.model || "unknown",
    cpuCores: cpuInfo.length,
    cpuSpeed: cpu?.speed || 0,
    totalMemoryGB: Math.round((totalmem() / (1024 * 1024 * 1024)) * 10) / 10,
    nodeVersion: process.version,
    timestamp: now.toISOString(),
  };
}

// src/observability/healthCheck.ts
// Health status over the vector store and the profile cache.
//
// Status levels:
// - healthy: store reachable, vectors and profiles present
// - degraded: store reachable but empty, or no profiles loaded (run ingestion)
// - unhealthy: store check failed or timed out

import type { VectorStore } from "../store/vectorStore";
import { errorMessage } from "../errors";
import { withTimeout } from "../utils/async";

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  profiles: number;
  vectors: number;
  checks: {
    vectorStore: HealthCheckResult;
  };
}

export interface HealthDeps {
  store: VectorStore;
  profileCount: () => number;
}

/* ---------- Constants ---------- */

const CHECK_TIMEOUT_MS = 5000;
const startTime = Date.now();

function getVersion(): string {
  return process.env.npm_package_version || "unknown";
}

/* ---------- Health Status ---------- */

export async function getHealthStatus(deps: HealthDeps): Promise<HealthStatus> {
  const started = Date.now();
  let vectors = 0;
  let vectorStore: HealthCheckResult;
  try {
    const stats = await withTimeout(deps.store.stats(), CHECK_TIMEOUT_MS, "Vector store check");
    vectors = stats.totalVectorCount;
    vectorStore = { status: "up", latency: Date.now() - started };
  } catch (err) {
    vectorStore = { status: "down", latency: Date.now() - started, error: errorMessage(err) };
  }

  const profiles = deps.profileCount();
  let status: HealthStatus["status"] = "healthy";
  if (vectorStore.status === "down") status = "unhealthy";
  else if (vectors === 0 || profiles === 0) status = "degraded";

  return {
    status,
    timestamp: new Date().toISOString(),
    version: getVersion(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    profiles,
    vectors,
    checks: { vectorStore },
  };
}

import type { Request, Response } from "express";
import { CircuitState, type CircuitBreakerStats } from "../../lib/reliability";
import type { SpeakerService } from "../voice/speakerService";

interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  checks: {
    registry: {
      status: "ok" | "error";
      enrolledUsers?: number;
      responseTime?: number;
      error?: string;
    };
    embedder: {
      status: "ok" | "open" | "half_open" | "unconfigured";
      failures?: number;
      totalRequests?: number;
    };
    memory: {
      used: number;
      total: number;
      percentage: number;
    };
  };
}

export interface HealthCheckDeps {
  service: SpeakerService;
  /** Circuit state of the embedding service, when one is configured. */
  embedderCircuit?: () => CircuitBreakerStats;
  version?: string;
  environment?: string;
}

/**
 * Comprehensive health check endpoint
 * GET /api/health
 */
export function createHealthCheckHandler(deps: HealthCheckDeps) {
  return async (_req: Request, res: Response): Promise<void> => {
    const health: HealthStatus = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: deps.version ?? process.env.npm_package_version ?? "1.0.0",
      environment: deps.environment ?? process.env.NODE_ENV ?? "development",
      checks: {
        registry: { status: "ok" },
        embedder: { status: "unconfigured" },
        memory: { used: 0, total: 0, percentage: 0 },
      },
    };

    try {
      const registryStart = Date.now();
      health.checks.registry.enrolledUsers = await deps.service.registry.count();
      health.checks.registry.responseTime = Date.now() - registryStart;
    } catch (error) {
      health.checks.registry.status = "error";
      health.checks.registry.error =
        error instanceof Error ? error.message : "Unknown error";
    }

    if (deps.embedderCircuit) {
      const circuit = deps.embedderCircuit();
      health.checks.embedder = {
        status:
          circuit.state === CircuitState.CLOSED
            ? "ok"
            : circuit.state === CircuitState.OPEN
              ? "open"
              : "half_open",
        failures: circuit.failures,
        totalRequests: circuit.totalRequests,
      };
    }

    const memUsage = process.memoryUsage();
    health.checks.memory = {
      used: Math.round(memUsage.heapUsed / 1024 / 1024),
      total: Math.round(memUsage.heapTotal / 1024 / 1024),
      percentage: Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100),
    };

    if (health.checks.registry.status === "error") {
      health.status = "unhealthy";
    } else if (
      health.checks.embedder.status === "open" ||
      health.checks.embedder.status === "half_open" ||
      health.checks.memory.percentage > 90
    ) {
      health.status = "degraded";
    }

    res.status(health.status === "unhealthy" ? 503 : 200).json(health);
  };
}

// src/health.ts

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

/**
 * Health of one part of a node.
 */
export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  /** Worst status among the components */
  status: HealthStatus;
  timestamp: Date;
  /** Listening address of the reporting node */
  node: string;
  components: ComponentHealth[];
  uptimeMs: number;
}

export interface HealthCheckable {
  getHealth(): ComponentHealth;
}

/**
 * Worst of the given statuses: unhealthy > degraded > healthy.
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes("unhealthy")) return "unhealthy";
  if (statuses.includes("degraded")) return "degraded";
  return "healthy";
}

/**
 * Collects component checks into one report.
 */
export class HealthAggregator {
  private readonly startTime: number;
  private readonly components = new Map<string, HealthCheckable>();

  constructor(private readonly node: string) {
    this.startTime = Date.now();
  }

  register(name: string, component: HealthCheckable): void {
    this.components.set(name, component);
  }

  unregister(name: string): void {
    this.components.delete(name);
  }

  getHealth(): HealthReport {
    const components: ComponentHealth[] = [];

    for (const [name, component] of this.components) {
      try {
        components.push(component.getHealth());
      } catch (err) {
        components.push({
          name,
          status: "unhealthy",
          message: `Health check failed: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    }

    return {
      status: combineHealthStatus(components.map((c) => c.status)),
      timestamp: new Date(),
      node: this.node,
      components,
      uptimeMs: Date.now() - this.startTime,
    };
  }
}

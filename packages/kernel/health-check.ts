import { getLogger } from '@kernel/logger';

/**
* Health Check Module
*
* Probes for the dependencies a process needs (database, queue broker),
* run in parallel with a per-probe timeout.
*/

const logger = getLogger('health-check');

const DEFAULT_CHECK_TIMEOUT_MS = 5000;

// ============================================================================
// Type Definitions
// ============================================================================

/**
* Result of a health check
*/
export interface HealthCheckResult {
  /** Name of the health check */
  name: string;
  /** Whether the check passed */
  healthy: boolean;
  /** Response latency in milliseconds */
  latency: number;
  /** Error message if unhealthy */
  error?: string | undefined;
}

export interface HealthCheck {
  name: string;
  check(): Promise<HealthCheckResult>;
}

export interface HealthReport {
  healthy: boolean;
  checks: HealthCheckResult[];
  timestamp: string;
}

// ============================================================================
// Health Check Functions
// ============================================================================

/**
* Build a check from a probe that resolves when the dependency is reachable
*/
export function createHealthCheck(name: string, probe: () => Promise<unknown>): HealthCheck {
  return {
    name,
    async check(): Promise<HealthCheckResult> {
      const start = Date.now();
      try {
        await probe();
        return { name, healthy: true, latency: Date.now() - start };
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        logger.warn('Health check failed', { name, error });
        return { name, healthy: false, latency: Date.now() - start, error };
      }
    },
  };
}

function withTimeout(check: HealthCheck, timeoutMs: number): Promise<HealthCheckResult> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeout = new Promise<HealthCheckResult>(resolve => {
    timeoutHandle = setTimeout(() => resolve({
      name: check.name,
      healthy: false,
      latency: timeoutMs,
      error: `Health check '${check.name}' timed out after ${timeoutMs}ms`,
    }), timeoutMs);
  });
  return Promise.race([check.check(), timeout]).finally(() => clearTimeout(timeoutHandle));
}

/**
* Run checks in parallel; a single hanging probe cannot block the report
*/
export async function runHealthChecks(
  checks: readonly HealthCheck[],
  timeoutMs: number = DEFAULT_CHECK_TIMEOUT_MS
): Promise<HealthReport> {
  const results = await Promise.all(checks.map(check => withTimeout(check, timeoutMs)));
  return {
    healthy: results.every(result => result.healthy),
    checks: results,
    timestamp: new Date().toISOString(),
  };
}

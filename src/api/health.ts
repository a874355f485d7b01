import type { Database } from '../db.ts';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResult {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthChecker {
  name: string;
  critical: boolean;
  check(): Promise<HealthCheckResult>;
}

export interface ComponentHealth {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  components: Record<string, ComponentHealth>;
}

export class DatabaseHealthChecker implements HealthChecker {
  readonly name = 'database';
  readonly critical = true;

  constructor(private db: Database) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      const result = await this.db.query<{ migrations: number }>('SELECT COUNT(*)::int AS migrations FROM schema_migrations');
      return {
        status: 'healthy',
        latency_ms: Date.now() - start,
        details: { migrations_applied: result.rows[0]?.migrations ?? 0 },
      };
    } catch (err) {
      return {
        status: 'unhealthy',
        latency_ms: Date.now() - start,
        details: { error: err instanceof Error ? err.message : 'Database connection failed' },
      };
    }
  }
}

/**
 * Reports whether the media directory recipe images are written to is usable.
 * Non-critical: the API still serves JSON when uploads are broken.
 */
export class MediaStorageHealthChecker implements HealthChecker {
  readonly name = 'media_storage';
  readonly critical = false;

  constructor(private probe: () => Promise<boolean>) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    const writable = await this.probe();
    return {
      status: writable ? 'healthy' : 'degraded',
      latency_ms: Date.now() - start,
      details: writable ? undefined : { error: 'Media directory is not writable' },
    };
  }
}

export class HealthCheckRegistry {
  private checkers: HealthChecker[] = [];

  register(checker: HealthChecker): void {
    this.checkers.push(checker);
  }

  async checkAll(): Promise<HealthResponse> {
    const components: Record<string, ComponentHealth> = {};
    let overallStatus: HealthStatus = 'healthy';

    for (const checker of this.checkers) {
      const result = await checker.check();
      components[checker.name] = {
        status: result.status,
        latency_ms: result.latency_ms,
        details: result.details,
      };

      if (result.status === 'unhealthy' && checker.critical) {
        overallStatus = 'unhealthy';
      } else if (result.status === 'unhealthy' && overallStatus === 'healthy') {
        overallStatus = 'degraded';
      } else if (result.status === 'degraded' && overallStatus === 'healthy') {
        overallStatus = 'degraded';
      }
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      components,
    };
  }

  async isReady(): Promise<boolean> {
    for (const checker of this.checkers) {
      if (!checker.critical) continue;
      const result = await checker.check();
      if (result.status === 'unhealthy') return false;
    }
    return true;
  }
}

import { constants } from 'fs';
import { access, mkdir } from 'fs/promises';
import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { isRedisAvailable } from '../redis';

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, boolean>;
  /** Optional dependencies, reported but not required */
  optional: Record<string, boolean>;
}

/**
 * Output directory exists (or can be created) and is writable
 */
export async function checkOutputDirectory(dir: string = env.OUTPUT_DIR): Promise<boolean> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Check if the service is ready to accept documents.
   * Redis is optional: batches run in-process without it.
   */
  async checkReadiness(): Promise<ReadinessReport> {
    const checks: Record<string, boolean> = {
      server: true,
      outputDirectory: await checkOutputDirectory(),
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks, optional: { redis: isRedisAvailable() } };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;

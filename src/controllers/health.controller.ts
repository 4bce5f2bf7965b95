import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Readiness check endpoint (output directory writable; Redis reported as optional)
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const report = await healthService.checkReadiness();

    if (report.ready) {
      sendSuccess(res, report, 'Service is ready');
    } else {
      const failed = Object.keys(report.checks).filter((name) => !report.checks[name]);
      sendError(res, `Service is not ready: ${failed.join(', ')}`, 503);
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;

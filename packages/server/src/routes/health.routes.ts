import { Router, type Request, type Response } from 'express';
import type { ApiResponse } from '../types/index.js';

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
}

export const healthRouter = Router();

healthRouter.get('/', (_req: Request, res: Response): void => {
  const response: ApiResponse<HealthStatus> = {
    success: true,
    data: {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    },
  };
  res.json(response);
});

import type { Request, Response, NextFunction } from 'express';

// 1 minute short-lived (dataset list, refreshed upstream hourly at most)
export function shortLived60(_req: Request, res: Response, next: NextFunction) {
  if (!res.getHeader('Cache-Control')) {
    res.setHeader('Cache-Control', 'public, max-age=60');
  }
  next();
}

// Coverages reflect live sensor data
export function noStore(_req: Request, res: Response, next: NextFunction) {
  if (!res.getHeader('Cache-Control')) {
    res.setHeader('Cache-Control', 'no-store');
  }
  next();
}

import type { Request, Response, NextFunction } from 'express';
import { Router } from 'express';
import client, { Counter, Histogram } from 'prom-client';

const register = new client.Registry();
client.collectDefaultMetrics({ register });

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  registers: [register]
});

const reservationsConfirmed = new Counter({
  name: 'reservations_confirmed_total',
  help: 'Reservations admitted and confirmed',
  registers: [register]
});

const reservationsRejected = new Counter({
  name: 'reservations_rejected_total',
  help: 'Booking requests rejected by policy',
  labelNames: ['reason'],
  registers: [register]
});

const reservationsCancelled = new Counter({
  name: 'reservations_cancelled_total',
  help: 'Reservations cancelled explicitly',
  registers: [register]
});

const reservationsRescheduled = new Counter({
  name: 'reservations_rescheduled_total',
  help: 'Reservations moved to a new slot',
  registers: [register]
});

const lockWaitDuration = new Histogram({
  name: 'resource_lock_wait_seconds',
  help: 'Time spent waiting for a per-resource booking lock',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register]
});

const lockTimeouts = new Counter({
  name: 'resource_lock_timeouts_total',
  help: 'Lock acquisitions abandoned after the configured budget',
  registers: [register]
});

export const metricsRouter = Router();

metricsRouter.get('/metrics', async (_req: Request, res: Response) => {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
});

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
    const route: unknown = req.route?.path;

    httpRequestDuration
      .labels(req.method, typeof route === 'string' ? route : req.path, String(res.statusCode))
      .observe(durationSeconds);
  });

  next();
}

export const reservationMetrics = {
  confirmed: reservationsConfirmed,
  rejected: reservationsRejected,
  cancelled: reservationsCancelled,
  rescheduled: reservationsRescheduled,
  lockWait: lockWaitDuration,
  lockTimeouts
};

export const metrics = {
  register,
  httpRequestDuration
};

export function resetAllMetrics(): void {
  register.resetMetrics();
}

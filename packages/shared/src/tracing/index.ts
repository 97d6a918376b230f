import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

import { config } from '../config';
import { logger } from '../logger';

type SpanStatus = 'ok' | 'error';

interface SpanContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  attributes: Record<string, unknown>;
  start: bigint;
}

const traceStore = new AsyncLocalStorage<SpanContext>();

function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

function durationMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

function createSpan(
  name: string,
  attributes: Record<string, unknown> = {},
  overrides?: { traceId?: string; parentSpanId?: string }
): SpanContext {
  const parent = traceStore.getStore();

  return {
    traceId: overrides?.traceId ?? parent?.traceId ?? generateTraceId(),
    spanId: generateSpanId(),
    parentSpanId: overrides?.parentSpanId ?? parent?.spanId,
    name,
    attributes,
    start: process.hrtime.bigint()
  };
}

function finishSpan(span: SpanContext, status: SpanStatus): void {
  const payload = {
    traceId: span.traceId,
    spanId: span.spanId,
    parentSpanId: span.parentSpanId,
    name: span.name,
    status,
    durationMs: durationMs(span.start),
    attributes: span.attributes
  };

  if (config.TRACING_EXPORT_JSON) {
    logger.info(payload, 'trace.span');
  } else {
    logger.debug(payload, 'trace.span');
  }
}

export async function runWithSpan<T>(
  name: string,
  handler: () => Promise<T>,
  attributes: Record<string, unknown> = {}
): Promise<T> {
  const span = createSpan(name, attributes);

  return traceStore.run(span, async () => {
    try {
      const result = await handler();
      finishSpan(span, 'ok');
      return result;
    } catch (error) {
      finishSpan(span, 'error');
      throw error;
    }
  });
}

export function getCurrentTraceId(): string | undefined {
  return traceStore.getStore()?.traceId;
}

export function traceMiddleware(req: Request, res: Response, next: NextFunction): void {
  const span = createSpan(
    `HTTP ${req.method} ${req.path}`,
    {
      'http.method': req.method,
      'http.target': req.originalUrl
    },
    {
      traceId: req.header('x-trace-id') ?? undefined,
      parentSpanId: req.header('x-span-parent') ?? undefined
    }
  );

  traceStore.run(span, () => {
    res.setHeader('x-trace-id', span.traceId);
    res.setHeader('x-span-parent', span.spanId);

    res.on('finish', () => {
      span.attributes['http.status_code'] = res.statusCode;

      logger.withContext({ traceId: span.traceId }).info(
        {
          method: req.method,
          route: req.originalUrl,
          status: res.statusCode,
          durationMs: durationMs(span.start)
        },
        'Request completed'
      );

      finishSpan(span, res.statusCode >= 500 ? 'error' : 'ok');
    });

    next();
  });
}

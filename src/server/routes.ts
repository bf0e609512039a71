import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { EventLoggerError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { IDLE_STATUS, type EventLogger } from '../event-logger.js';
import type { TransitionResult } from '../types.js';

export const togglePayloadSchema = z.object({
  event: z.string().trim().min(1),
  notes: z.string().optional().default(''),
});

export const abortPayloadSchema = z.object({
  notes: z.string().optional().default(''),
});

export const missingEventPayloadSchema = z.object({
  event: z.string().trim().min(1),
  start_time: z.string().min(1),
  end_time: z.string().min(1),
  notes: z.string().optional().default(''),
});

export interface StatusPayload {
  status: string;
  active_event: string | null;
}

export interface RouteResponse<T extends StatusPayload = StatusPayload> {
  statusCode: number;
  body: T;
}

const ERROR_STATUS_CODES: Record<EventLoggerError['code'], number> = {
  NO_ACTIVE_EVENT: 409,
  UNKNOWN_EVENT: 400,
  INVALID_TIME_RANGE: 400,
  INVALID_TRANSITION: 409,
  INVALID_PROJECT_ID: 400,
  WRITE_FAILURE: 500,
};

function ok(result: TransitionResult): RouteResponse {
  return { statusCode: 200, body: { status: result.status, active_event: result.activeEvent } };
}

function invalid(eventLogger: EventLogger, error: z.ZodError): RouteResponse {
  const details = error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
  return {
    statusCode: 400,
    body: { status: `Invalid request (${details})`, active_event: eventLogger.activeEvent },
  };
}

/** Maps a domain error to a response; anything else is rethrown. */
export function errorResponse(eventLogger: EventLogger, err: unknown): RouteResponse {
  if (!(err instanceof EventLoggerError)) throw err;

  if (err.code === 'WRITE_FAILURE') {
    logger.error(err.message);
  } else {
    logger.warn(err.message);
  }
  return {
    statusCode: ERROR_STATUS_CODES[err.code],
    body: { status: err.message, active_event: eventLogger.activeEvent },
  };
}

function run(eventLogger: EventLogger, action: () => TransitionResult): RouteResponse {
  try {
    return ok(action());
  } catch (err) {
    return errorResponse(eventLogger, err);
  }
}

export function handleToggleEvent(eventLogger: EventLogger, body: unknown): RouteResponse {
  const parsed = togglePayloadSchema.safeParse(body);
  if (!parsed.success) return invalid(eventLogger, parsed.error);
  const { event, notes } = parsed.data;
  return run(eventLogger, () => eventLogger.toggleEvent(event, notes));
}

export function handleAbortEvent(eventLogger: EventLogger, body: unknown): RouteResponse {
  const parsed = abortPayloadSchema.safeParse(body ?? {});
  if (!parsed.success) return invalid(eventLogger, parsed.error);
  return run(eventLogger, () => eventLogger.abortEvent(parsed.data.notes));
}

export function handleMissingEvent(eventLogger: EventLogger, body: unknown): RouteResponse {
  const parsed = missingEventPayloadSchema.safeParse(body);
  if (!parsed.success) return invalid(eventLogger, parsed.error);
  const { event, start_time, end_time, notes } = parsed.data;
  return run(eventLogger, () =>
    eventLogger.addMissingEvent({ eventType: event, startTime: start_time, endTime: end_time, notes }),
  );
}

export interface SessionStatusPayload extends StatusPayload {
  started_at: string | null;
  log_file: string;
  event_types: string[];
  project_id: string | null;
}

export function handleStatus(eventLogger: EventLogger, projectId: string | null): RouteResponse<SessionStatusPayload> {
  const status = eventLogger.status();
  return {
    statusCode: 200,
    body: {
      status: status.activeEvent ? `${status.activeEvent} has started` : IDLE_STATUS,
      active_event: status.activeEvent,
      started_at: status.startedAt,
      log_file: status.logFile,
      event_types: eventLogger.listEventTypes(),
      project_id: projectId,
    },
  };
}

function send(res: Response, response: RouteResponse<StatusPayload>): void {
  res.status(response.statusCode).json(response.body);
}

export function createEventRoutes(eventLogger: EventLogger, projectId: string | null): Router {
  const router = Router();

  router.use((_req, res, next) => {
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
    next();
  });

  router.post('/toggle_event', (req: Request, res: Response) => send(res, handleToggleEvent(eventLogger, req.body)));
  router.post('/abort_event', (req: Request, res: Response) => send(res, handleAbortEvent(eventLogger, req.body)));
  router.post('/missing_event', (req: Request, res: Response) => send(res, handleMissingEvent(eventLogger, req.body)));
  router.get('/status', (_req: Request, res: Response) => send(res, handleStatus(eventLogger, projectId)));

  return router;
}

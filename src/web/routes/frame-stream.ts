/**
 * Frame Stream Route
 *
 * Server-Sent Events carrying the cv-frame topic (one event per stdout line
 * of the primary process) and session lifecycle notifications.
 */

import { Router, Request, Response } from 'express';
import {
  CV_FRAME_TOPIC,
  SESSION_TOPIC,
  SessionEvent,
  SessionEventChannel,
  SessionEventSubscriber,
} from '../../events/session-event-channel';

export interface FrameStreamOptions {
  /** Heartbeat interval in ms (default: 30000) */
  heartbeatMs?: number;
}

export function formatSseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function createFrameStreamRoutes(channel: SessionEventChannel, options: FrameStreamOptions = {}): Router {
  const router = Router();
  const heartbeatMs = options.heartbeatMs ?? 30000;

  // ===================
  // GET /api/frames/stream
  // ===================
  router.get('/stream', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write(formatSseEvent('connected', { connected: true, timestamp: new Date().toISOString() }));

    // Late joiners get the most recent frame straight away
    const latest = channel.getLatest(CV_FRAME_TOPIC);
    if (latest) {
      res.write(formatSseEvent(CV_FRAME_TOPIC, latest.payload));
    }

    const subscriber: SessionEventSubscriber = {
      onEvent(event: SessionEvent) {
        if (event.topic === SESSION_TOPIC) {
          res.write(`event: ${SESSION_TOPIC}\ndata: ${event.payload}\n\n`);
          return;
        }
        res.write(formatSseEvent(event.topic, event.payload));
      },
    };
    const unsubscribe = channel.subscribe(subscriber, { topics: [CV_FRAME_TOPIC, SESSION_TOPIC] });

    const heartbeat = setInterval(() => {
      res.write(formatSseEvent('heartbeat', { timestamp: new Date().toISOString() }));
    }, heartbeatMs);

    res.on('close', () => {
      unsubscribe();
      clearInterval(heartbeat);
    });
  });

  return router;
}

#!/usr/bin/env node
/**
 * CV Session Bridge - CLI Entry Point
 *
 * Usage:
 *   cv-session [serve] [--root <dir>] [--port <n>] [--host <h>] [--launcher <name>]...
 */

import { SessionService } from '../session/session-service';
import { WebServer } from '../web/server';
import { ServeArguments, parseServeArgs } from './serve-args';

const HELP_TEXT = `
CV Session Bridge - CLI

Usage:
  cv-session [serve] [options]

Options:
  --root <dir>        Directory holding cv/, session_config.json and workout_id.json
                      (default: $CV_SESSION_ROOT or the current directory)
  --port <number>     HTTP port (default: $CV_SESSION_PORT or 5680)
  --host <host>       HTTP host (default: $CV_SESSION_HOST or 127.0.0.1)
  --launcher <name>   Launcher for the primary script; repeat for fallbacks
                      (default: python3, then python)
  -h, --help          Show this help

Endpoints:
  POST /api/session/start     Start the CV process and session scripts
  POST /api/session/stop      Kill the CV process and session scripts
  GET  /api/session/status    Current session state
  POST /api/workout-id        {"workout_id": "...", "session": "on"|"off"}
  GET  /api/reps              Rep count, last summary, rep timestamps
  GET  /api/live-metrics      Latest live metrics snapshot
  GET  /api/frames/stream     Server-Sent Events: cv-frame, session
`;

async function serve(args: ServeArguments): Promise<void> {
  const service = new SessionService({ root: args.root, launchers: args.launchers });
  const server = new WebServer({ service, port: args.port, host: args.host });

  await server.start();
  console.log(`[cv-session] Root: ${service.paths.root}`);
  console.log(`[cv-session] Listening on ${server.getUrl()}`);
  console.log('[cv-session] Press Ctrl+C to stop');

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log('\n[cv-session] Shutting down...');
    try {
      await service.shutdown();
      await server.stop();
      console.log('[cv-session] Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('[cv-session] Shutdown failed:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(HELP_TEXT);
    return;
  }

  const rest = argv[0] === 'serve' ? argv.slice(1) : argv;
  if (rest.length > 0 && !rest[0].startsWith('-')) {
    console.error(`Unknown command: ${rest[0]}`);
    console.log(HELP_TEXT);
    process.exit(1);
  }

  const parsed = parseServeArgs(rest);
  if (!parsed.ok) {
    console.error(parsed.error);
    process.exit(1);
  }

  await serve(parsed.args);
}

main().catch((error: unknown) => {
  console.error('[cv-session] Fatal:', error);
  process.exit(1);
});

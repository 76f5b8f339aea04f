/**
 * Output Pump
 *
 * Streams the primary process's stdout into the event channel, one
 * newline-delimited record per event, in read order. Records are opaque
 * (base64 frames in practice) and forwarded verbatim.
 *
 * The pump ends when the stream closes or errors. It never restarts and
 * never signals the supervisor; killing the primary is what stops it.
 */

import { Readable } from 'stream';
import { CV_FRAME_TOPIC, PublishReport, SessionTopic } from '../events/session-event-channel';
import { SessionLogger } from '../logging/session-logger';

export interface EventPublisher {
  publish(topic: SessionTopic, payload: string): PublishReport;
}

export type PumpEndReason = 'eof' | 'error';

export interface PumpStats {
  running: boolean;
  linesPublished: number;
  publishFailures: number;
}

export interface PumpSummary {
  linesPublished: number;
  publishFailures: number;
  endReason: PumpEndReason;
  error?: string;
}

export interface OutputPumpOptions {
  topic?: SessionTopic;
  logger?: SessionLogger;
}

/**
 * Records end at '\n' only; one trailing '\r' is dropped
 */
function stripCarriageReturn(record: string): string {
  return record.endsWith('\r') ? record.slice(0, -1) : record;
}

export class OutputPump {
  /** Settles once the stream has closed; never rejects */
  readonly done: Promise<PumpSummary>;

  private running = true;
  private linesPublished = 0;
  private publishFailures = 0;
  private readonly topic: SessionTopic;

  constructor(
    stream: Readable,
    private readonly publisher: EventPublisher,
    private readonly options: OutputPumpOptions = {}
  ) {
    this.topic = options.topic ?? CV_FRAME_TOPIC;
    this.done = new Promise<PumpSummary>((resolve) => {
      let pending = '';
      let endReason: PumpEndReason = 'eof';
      let errorMessage: string | undefined;
      let finished = false;

      const finish = (): void => {
        if (finished) {
          return;
        }
        finished = true;
        this.running = false;
        const summary: PumpSummary = {
          linesPublished: this.linesPublished,
          publishFailures: this.publishFailures,
          endReason,
          error: errorMessage,
        };
        this.options.logger?.debug('PUMP', `Output pump ended (${endReason})`, { ...summary });
        resolve(summary);
      };

      stream.setEncoding('utf-8');
      stream.on('data', (chunk: string) => {
        const records = (pending + chunk).split('\n');
        pending = records.pop() ?? '';
        for (const record of records) {
          this.forward(stripCarriageReturn(record));
        }
      });
      stream.once('end', () => {
        // Final record without a newline
        if (pending.length > 0) {
          this.forward(stripCarriageReturn(pending));
          pending = '';
        }
        finish();
      });
      stream.once('error', (error: Error) => {
        endReason = 'error';
        errorMessage = error.message;
        finish();
      });
      // A destroyed stream emits 'close' without 'end'
      stream.once('close', finish);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): PumpStats {
    return {
      running: this.running,
      linesPublished: this.linesPublished,
      publishFailures: this.publishFailures,
    };
  }

  private forward(line: string): void {
    try {
      const report = this.publisher.publish(this.topic, line);
      if (report.failed > 0) {
        this.publishFailures++;
      }
    } catch {
      // Publishing is best-effort; the pump keeps reading
      this.publishFailures++;
    }
    this.linesPublished++;
  }
}

/**
 * Start pumping `stream` into `publisher` on the event loop.
 * Returns immediately; await `done` to observe the end.
 */
export function startOutputPump(
  stream: Readable,
  publisher: EventPublisher,
  options: OutputPumpOptions = {}
): OutputPump {
  return new OutputPump(stream, publisher, options);
}

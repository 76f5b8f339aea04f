/**
 * Session Event Channel
 *
 * Publish/subscribe bridge between the bridge's background tasks and its
 * front-end subscribers (SSE clients, tests, embedding applications).
 *
 * - publish() never throws; delivery failures are counted, not raised
 * - subscribers may filter by topic
 * - the most recent events per topic are kept for late joiners
 */

export const CV_FRAME_TOPIC = 'cv-frame';
export const SESSION_TOPIC = 'session';

export type SessionTopic = typeof CV_FRAME_TOPIC | typeof SESSION_TOPIC;

export interface SessionEvent {
  topic: SessionTopic;
  payload: string;
  sequence: number;
  timestamp: string;
}

export interface SessionEventSubscriber {
  onEvent(event: SessionEvent): void;
}

export interface PublishReport {
  sequence: number;
  delivered: number;
  failed: number;
}

export interface SessionEventChannelOptions {
  /** Events kept per topic for late joiners (default: 1) */
  maxBufferSize?: number;
}

interface Subscription {
  subscriber: SessionEventSubscriber;
  topics: ReadonlySet<SessionTopic> | null;
}

export class SessionEventChannel {
  private subscriptions: Set<Subscription> = new Set();
  private recent: Map<SessionTopic, SessionEvent[]> = new Map();
  private sequence = 0;
  private readonly maxBufferSize: number;

  constructor(options: SessionEventChannelOptions = {}) {
    this.maxBufferSize = Math.max(0, options.maxBufferSize ?? 1);
  }

  publish(topic: SessionTopic, payload: string): PublishReport {
    const event: SessionEvent = {
      topic,
      payload,
      sequence: ++this.sequence,
      timestamp: new Date().toISOString(),
    };

    this.remember(event);

    let delivered = 0;
    let failed = 0;
    for (const subscription of this.subscriptions) {
      if (subscription.topics && !subscription.topics.has(topic)) {
        continue;
      }
      try {
        subscription.subscriber.onEvent(event);
        delivered++;
      } catch {
        // A failing subscriber must not affect the publisher or its peers
        failed++;
      }
    }

    return { sequence: event.sequence, delivered, failed };
  }

  /**
   * Subscribe to every topic, or only to the listed ones
   */
  subscribe(subscriber: SessionEventSubscriber, options: { topics?: SessionTopic[] } = {}): () => void {
    const subscription: Subscription = {
      subscriber,
      topics: options.topics ? new Set(options.topics) : null,
    };
    this.subscriptions.add(subscription);

    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  getSubscriberCount(): number {
    return this.subscriptions.size;
  }

  getLatest(topic: SessionTopic): SessionEvent | undefined {
    const events = this.recent.get(topic);
    return events && events.length > 0 ? events[events.length - 1] : undefined;
  }

  getRecent(topic: SessionTopic): SessionEvent[] {
    return [...(this.recent.get(topic) ?? [])];
  }

  clear(): void {
    this.recent.clear();
    this.sequence = 0;
  }

  private remember(event: SessionEvent): void {
    if (this.maxBufferSize === 0) {
      return;
    }
    const events = this.recent.get(event.topic) ?? [];
    events.push(event);
    if (events.length > this.maxBufferSize) {
      events.splice(0, events.length - this.maxBufferSize);
    }
    this.recent.set(event.topic, events);
  }
}

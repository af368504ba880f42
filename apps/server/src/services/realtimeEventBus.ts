import { randomUUID } from "node:crypto";

export type RealtimeEventType = "run.progress" | "run.stage_changed" | "run.completed";

export interface RealtimeEventEnvelope {
  eventId: string;
  type: RealtimeEventType;
  timestamp: string;
  runId: string;
  data: Record<string, unknown>;
}

interface SubscriberFilter {
  runId?: string;
}

type SubscriberHandler = (event: RealtimeEventEnvelope) => void;

interface Subscriber {
  filter: SubscriberFilter;
  handler: SubscriberHandler;
}

/**
 * In-process pub/sub bus for SSE fanout.
 * No history: a subscriber only sees events published after it joined.
 */
export class RealtimeEventBus {
  private readonly subscribers = new Map<string, Subscriber>();

  subscribe(filter: SubscriberFilter, handler: SubscriberHandler) {
    const subscriberId = randomUUID();
    this.subscribers.set(subscriberId, { filter, handler });
    return () => {
      this.subscribers.delete(subscriberId);
    };
  }

  publish(event: Omit<RealtimeEventEnvelope, "eventId" | "timestamp">) {
    const envelope: RealtimeEventEnvelope = {
      ...event,
      eventId: randomUUID(),
      timestamp: new Date().toISOString()
    };

    for (const subscriber of this.subscribers.values()) {
      if (subscriber.filter.runId && subscriber.filter.runId !== envelope.runId) continue;
      subscriber.handler(envelope);
    }
  }
}

export const realtimeEventBus = new RealtimeEventBus();

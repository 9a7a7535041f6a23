import type { AgentEvents, EventBus, Subscription, Topic } from "../../domain/events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

type HandlerSets<T extends Topic = Topic> = {
  [K in T]?: Set<(payload: AgentEvents[K]) => void>;
};

export class SimpleEventBus implements EventBus {
  private readonly handlers: HandlerSets = {};

  constructor(private readonly logger?: LoggerPort) {}

  publish<K extends Topic>(topic: K, payload: AgentEvents[K]): void {
    const listeners = this.handlers[topic];
    if (!listeners) return;
    for (const handler of Array.from(listeners)) {
      try {
        handler(payload);
      } catch (err) {
        if (this.logger) {
          this.logger.warn(`Event handler for topic ${topic} failed`, { error: err });
        } else {
          console.warn(`Event handler for topic ${topic} failed:`, err);
        }
      }
    }
  }

  subscribe<K extends Topic>(topic: K, handler: (payload: AgentEvents[K]) => void): Subscription {
    const handlers: HandlerSets<K> = this.handlers;
    const listeners: Set<(payload: AgentEvents[K]) => void> = handlers[topic] ?? new Set();
    handlers[topic] = listeners;
    listeners.add(handler);

    return {
      unsubscribe: () => {
        listeners.delete(handler);
        if (listeners.size === 0 && this.handlers[topic] === listeners) {
          delete this.handlers[topic];
        }
      },
    };
  }
}

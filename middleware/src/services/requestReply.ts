import type { MessageBus } from './mqttService';

interface ReplyOptions<T> {
  requestTopic: string;
  responseTopic: string;
  request: object;
  timeoutMs: number;
  /** Returns the decoded reply, or null when the message is not one we are waiting for. */
  accept: (message: Buffer) => T | null;
}

/**
 * Publishes a request and resolves with the first accepted reply, or null once
 * the timeout elapses. Also resolves null when the request cannot be published.
 */
export function awaitReply<T>(bus: MessageBus, opts: ReplyOptions<T>): Promise<T | null> {
  return new Promise((resolve) => {
    let settled = false;

    const finish = (value: T | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      unsubscribe();
      resolve(value);
    };

    const unsubscribe = bus.onMessage((topic, message) => {
      if (topic !== opts.responseTopic) return;
      const reply = opts.accept(message);
      if (reply !== null) finish(reply);
    });

    const timer = setTimeout(() => finish(null), opts.timeoutMs);

    bus.publish(opts.requestTopic, JSON.stringify(opts.request)).then(
      (sent) => {
        if (!sent) finish(null);
      },
      () => finish(null),
    );
  });
}

/**
 * Publishes a request and gathers every accepted reply until the timeout,
 * keeping the first reply per key.
 */
export function collectReplies<T>(
  bus: MessageBus,
  opts: ReplyOptions<T> & { keyOf: (reply: T) => string },
): Promise<T[]> {
  return new Promise((resolve) => {
    const replies = new Map<string, T>();

    const unsubscribe = bus.onMessage((topic, message) => {
      if (topic !== opts.responseTopic) return;
      const reply = opts.accept(message);
      if (reply === null) return;

      const key = opts.keyOf(reply);
      if (!replies.has(key)) replies.set(key, reply);
    });

    const finish = () => {
      clearTimeout(timer);
      unsubscribe();
      resolve([...replies.values()]);
    };

    const timer = setTimeout(finish, opts.timeoutMs);

    bus.publish(opts.requestTopic, JSON.stringify(opts.request)).then(
      (sent) => {
        if (!sent) finish();
      },
      () => finish(),
    );
  });
}

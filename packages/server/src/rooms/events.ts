import type { ProduceType } from '@huddle/schemas';

export type RoomEvent =
  | { type: 'userJoined'; userId: string }
  | { type: 'userLeft'; userId: string }
  | { type: 'userStartProduce'; userId: string; produceType: ProduceType }
  | { type: 'userStopProduce'; userId: string; produceType: ProduceType }
  | { type: 'roomDelete' };

export class RoomEventOverflowError extends Error {
  constructor(capacity: number) {
    super(`Room event subscriber fell more than ${capacity} events behind`);
    this.name = 'RoomEventOverflowError';
  }
}

export interface RoomSubscription {
  /**
   * Next event in publish order. Resolves `null` once the subscription or the
   * bus is closed and everything already buffered has been handed out.
   */
  next(): Promise<RoomEvent | null>;
  close(): void;
}

export interface RoomEventBus {
  readonly closed: boolean;
  readonly subscriberCount: number;
  publish(event: RoomEvent): void;
  subscribe(): RoomSubscription | null;
  close(): void;
}

interface Waiter {
  resolve: (event: RoomEvent | null) => void;
  reject: (error: Error) => void;
}

interface Subscriber extends RoomSubscription {
  deliver(event: RoomEvent): void;
  end(): void;
}

const createSubscriber = (capacity: number, detach: (subscriber: Subscriber) => void): Subscriber => {
  const buffer: RoomEvent[] = [];
  let waiters: Waiter[] = [];
  let overflow: RoomEventOverflowError | null = null;
  let ended = false;

  const flushWaiters = (): void => {
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (overflow) {
        waiter.reject(overflow);
      } else {
        waiter.resolve(null);
      }
    }
  };

  const subscriber: Subscriber = {
    deliver(event: RoomEvent): void {
      if (ended || overflow) {
        return;
      }

      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve(event);
        return;
      }

      if (buffer.length >= capacity) {
        overflow = new RoomEventOverflowError(capacity);
        buffer.length = 0;
        return;
      }

      buffer.push(event);
    },
    end(): void {
      ended = true;
      flushWaiters();
    },
    next(): Promise<RoomEvent | null> {
      if (overflow) {
        return Promise.reject(overflow);
      }

      const buffered = buffer.shift();
      if (buffered) {
        return Promise.resolve(buffered);
      }

      if (ended) {
        return Promise.resolve(null);
      }

      return new Promise<RoomEvent | null>((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },
    close(): void {
      if (ended) {
        return;
      }

      buffer.length = 0;
      subscriber.end();
      detach(subscriber);
    },
  };

  return subscriber;
};

export const createRoomEventBus = (capacity: number): RoomEventBus => {
  const subscribers = new Set<Subscriber>();
  let closed = false;

  const detach = (subscriber: Subscriber): void => {
    subscribers.delete(subscriber);
  };

  return {
    get closed() {
      return closed;
    },
    get subscriberCount() {
      return subscribers.size;
    },
    publish(event: RoomEvent): void {
      if (closed) {
        return;
      }

      for (const subscriber of [...subscribers]) {
        subscriber.deliver(event);
      }
    },
    subscribe(): RoomSubscription | null {
      if (closed) {
        return null;
      }

      const subscriber = createSubscriber(capacity, detach);
      subscribers.add(subscriber);
      return subscriber;
    },
    close(): void {
      if (closed) {
        return;
      }

      closed = true;
      for (const subscriber of subscribers) {
        subscriber.end();
      }
      subscribers.clear();
    },
  };
};

import { compareNewestFirst, type ChatMessage } from "../services/chatTypes";

export type FeedEvent = Readonly<{
  type: "message_created";
  groupId: string;
  message: ChatMessage;
}>;

export type OverflowPolicy = "drop_oldest" | "disconnect";

export type FeedHandler = (event: FeedEvent) => void | Promise<void>;

export type SubscribeOptions = Readonly<{
  bufferSize?: number;
  overflowPolicy?: OverflowPolicy;
  onDisconnect?: (reason: "overflow") => void;
}>;

export type FeedSubscription = Readonly<{
  unsubscribe(): void;
  isActive(): boolean;
  droppedCount(): number;
}>;

export type ChangeFeedDeps = Readonly<{
  bufferSize?: number;
  overflowPolicy?: OverflowPolicy;
  logger?: Pick<Console, "error" | "warn">;
}>;

export type ChangeFeed = Readonly<{
  /** Called after commit. Never throws and never waits on subscribers. */
  publish(message: ChatMessage): void;
  subscribe(groupId: string, handler: FeedHandler, options?: SubscribeOptions): FeedSubscription;
  subscriberCount(groupId: string): number;
  drain(): Promise<void>;
  close(): void;
}>;

type Subscriber = {
  groupId: string;
  handler: FeedHandler;
  bufferSize: number;
  overflowPolicy: OverflowPolicy;
  onDisconnect?: (reason: "overflow") => void;
  queue: FeedEvent[];
  active: boolean;
  dropped: number;
  pumping: Promise<void> | null;
};

const DEFAULT_BUFFER_SIZE = 256;

export function createChangeFeed(deps: ChangeFeedDeps = {}): ChangeFeed {
  const defaultBufferSize = deps.bufferSize ?? DEFAULT_BUFFER_SIZE;
  const defaultOverflowPolicy = deps.overflowPolicy ?? "drop_oldest";
  const logger = deps.logger ?? console;

  if (!Number.isInteger(defaultBufferSize) || defaultBufferSize <= 0) {
    throw new Error("changeFeed requires a positive integer bufferSize.");
  }

  const subscribersByGroup = new Map<string, Set<Subscriber>>();
  const lastPublishedByGroup = new Map<string, ChatMessage>();

  function remove(sub: Subscriber): void {
    sub.active = false;
    sub.queue.length = 0;
    const set = subscribersByGroup.get(sub.groupId);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) subscribersByGroup.delete(sub.groupId);
  }

  async function deliverQueued(sub: Subscriber): Promise<void> {
    while (sub.active && sub.queue.length > 0) {
      const event = sub.queue.shift();
      if (!event) break;
      try {
        await sub.handler(event);
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        logger.error(`[GroupChat] Feed subscriber failed for group ${sub.groupId}: ${message}`);
      }
    }
  }

  function schedule(sub: Subscriber): void {
    if (sub.pumping) return;
    sub.pumping = Promise.resolve()
      .then(() => deliverQueued(sub))
      .finally(() => {
        sub.pumping = null;
        if (sub.active && sub.queue.length > 0) schedule(sub);
      });
  }

  function enqueue(sub: Subscriber, event: FeedEvent): void {
    if (!sub.active) return;
    if (sub.queue.length >= sub.bufferSize) {
      if (sub.overflowPolicy === "disconnect") {
        remove(sub);
        sub.onDisconnect?.("overflow");
        return;
      }
      sub.queue.shift();
      sub.dropped += 1;
    }
    sub.queue.push(event);
    schedule(sub);
  }

  return {
    publish(message: ChatMessage): void {
      const previous = lastPublishedByGroup.get(message.groupId);
      if (previous && compareNewestFirst(previous, message) <= 0 && previous.id !== message.id) {
        logger.warn(`[GroupChat] Feed event ${message.id} published out of order for group ${message.groupId}.`);
      } else {
        lastPublishedByGroup.set(message.groupId, message);
      }

      const set = subscribersByGroup.get(message.groupId);
      if (!set) return;
      const event: FeedEvent = { type: "message_created", groupId: message.groupId, message };
      for (const sub of Array.from(set)) {
        enqueue(sub, event);
      }
    },

    subscribe(groupId: string, handler: FeedHandler, options: SubscribeOptions = {}): FeedSubscription {
      const bufferSize = options.bufferSize ?? defaultBufferSize;
      if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
        throw new Error("changeFeed subscription requires a positive integer bufferSize.");
      }
      const sub: Subscriber = {
        groupId,
        handler,
        bufferSize,
        overflowPolicy: options.overflowPolicy ?? defaultOverflowPolicy,
        onDisconnect: options.onDisconnect,
        queue: [],
        active: true,
        dropped: 0,
        pumping: null
      };
      const set = subscribersByGroup.get(groupId) ?? new Set<Subscriber>();
      set.add(sub);
      subscribersByGroup.set(groupId, set);

      return {
        unsubscribe: () => remove(sub),
        isActive: () => sub.active,
        droppedCount: () => sub.dropped
      };
    },

    subscriberCount(groupId: string): number {
      return subscribersByGroup.get(groupId)?.size ?? 0;
    },

    async drain(): Promise<void> {
      for (;;) {
        const pending: Promise<void>[] = [];
        for (const set of subscribersByGroup.values()) {
          for (const sub of set) {
            if (sub.pumping) pending.push(sub.pumping);
          }
        }
        if (pending.length === 0) return;
        await Promise.all(pending);
      }
    },

    close(): void {
      for (const set of Array.from(subscribersByGroup.values())) {
        for (const sub of Array.from(set)) remove(sub);
      }
      lastPublishedByGroup.clear();
    }
  };
}

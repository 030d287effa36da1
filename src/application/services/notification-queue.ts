import { z } from "zod";
import { type Notification, NotificationLevel } from "../../core/entities/notification.entity.js";
import type { SessionValue } from "../../core/ports/session-store.js";

/**
 * Per-request list of user-facing messages.
 * Entries are delivered once: `drainAll` empties the queue.
 */
export interface NotificationQueue {
  enqueue(level: NotificationLevel, text: string): void;
  success(text: string): void;
  info(text: string): void;
  warning(text: string): void;
  error(text: string): void;
  /** Current entries, in enqueue order, without removing them */
  entries(): readonly Notification[];
  drainAll(): Notification[];
  readonly size: number;
  isEmpty(): boolean;
}

export const createNotificationQueue = (seed: readonly Notification[] = []): NotificationQueue => {
  let queue: Notification[] = [...seed];

  const enqueue = (level: NotificationLevel, text: string): void => {
    queue.push({ level, text });
  };

  return {
    enqueue,
    success: (text) => enqueue(NotificationLevel.SUCCESS, text),
    info: (text) => enqueue(NotificationLevel.INFO, text),
    warning: (text) => enqueue(NotificationLevel.WARNING, text),
    error: (text) => enqueue(NotificationLevel.ERROR, text),
    entries: () => [...queue],
    drainAll() {
      const drained = queue;
      queue = [];
      return drained;
    },
    get size() {
      return queue.length;
    },
    isEmpty: () => queue.length === 0,
  };
};

// ── Flash: notifications carried across a redirect ──

const flashSchema = z.array(
  z.object({
    level: z.nativeEnum(NotificationLevel),
    text: z.string(),
  }),
);

export const notificationsToFlash = (notifications: readonly Notification[]): SessionValue =>
  notifications.map((n) => ({ level: n.level, text: n.text }));

/** Malformed flash data reads as empty */
export const notificationsFromFlash = (value: SessionValue | undefined): Notification[] => {
  if (value === undefined) return [];
  const parsed = flashSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
};

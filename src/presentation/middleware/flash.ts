import {
  type NotificationQueue,
  createNotificationQueue,
  notificationsFromFlash,
  notificationsToFlash,
} from "../../application/services/notification-queue.js";
import type { AppError } from "../../core/errors/app-error.js";
import { type SessionHandle, SessionKey } from "../../core/ports/session-store.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * Open the request's notification queue, seeded with whatever a previous
 * redirect left behind. The stored flash is consumed.
 */
export const takeFlash = async (
  session: SessionHandle,
): Promise<Result<NotificationQueue, AppError>> => {
  const stored = await session.get(SessionKey.FLASH);
  if (!stored.ok) return stored;
  if (stored.value === undefined) return ok(createNotificationQueue());

  const removed = await session.delete(SessionKey.FLASH);
  if (!removed.ok) return removed;
  return ok(createNotificationQueue(notificationsFromFlash(stored.value)));
};

/** Move undelivered notifications into the session for the next request */
export const stashFlash = async (
  session: SessionHandle,
  queue: NotificationQueue,
): Promise<Result<number, AppError>> => {
  if (queue.isEmpty()) return ok(0);
  const pending = queue.entries();
  const written = await session.set(SessionKey.FLASH, notificationsToFlash(pending));
  if (!written.ok) return written;
  queue.drainAll();
  return ok(pending.length);
};

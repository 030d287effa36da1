import { describe, expect, it } from "vitest";
import {
  createNotificationQueue,
  notificationsFromFlash,
  notificationsToFlash,
} from "../../src/application/services/notification-queue.js";
import { NotificationLevel } from "../../src/core/entities/notification.entity.js";

describe("Notification queue", () => {
  it("keeps entries in enqueue order", () => {
    const q = createNotificationQueue();
    q.success("saved");
    q.info("note");
    q.warning("careful");
    q.error("failed");

    expect(q.size).toBe(4);
    expect(q.entries().map((n) => n.level)).toEqual(["success", "info", "warning", "error"]);
  });

  it("entries does not consume", () => {
    const q = createNotificationQueue();
    q.info("a");
    q.entries();
    expect(q.isEmpty()).toBe(false);
  });

  it("drainAll empties the queue once", () => {
    const q = createNotificationQueue([{ level: NotificationLevel.INFO, text: "seeded" }]);
    q.success("added");

    expect(q.drainAll()).toEqual([
      { level: "info", text: "seeded" },
      { level: "success", text: "added" },
    ]);
    expect(q.drainAll()).toEqual([]);
    expect(q.isEmpty()).toBe(true);
  });

  it("does not share the seed array", () => {
    const seed = [{ level: NotificationLevel.INFO, text: "x" }];
    const q = createNotificationQueue(seed);
    q.drainAll();
    expect(seed.length).toBe(1);
  });
});

describe("Flash encoding", () => {
  it("reads back what it writes", () => {
    const stored = notificationsToFlash([{ level: NotificationLevel.WARNING, text: "w" }]);
    expect(notificationsFromFlash(stored)).toEqual([{ level: "warning", text: "w" }]);
  });

  it("reads missing or malformed data as empty", () => {
    expect(notificationsFromFlash(undefined)).toEqual([]);
    expect(notificationsFromFlash("nope")).toEqual([]);
    expect(notificationsFromFlash([{ level: "loud", text: "x" }])).toEqual([]);
  });
});

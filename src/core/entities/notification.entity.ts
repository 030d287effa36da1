/**
 * A user-facing notification queued during a request and shown as a toast.
 */
export const NotificationLevel = {
  SUCCESS: "success",
  INFO: "info",
  WARNING: "warning",
  ERROR: "error",
} as const;

export type NotificationLevel = (typeof NotificationLevel)[keyof typeof NotificationLevel];

export interface Notification {
  readonly level: NotificationLevel;
  readonly text: string;
}

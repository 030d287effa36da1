import { z } from "zod";
import { NotificationLevel } from "../../core/entities/notification.entity.js";

export const notificationSchema = z.object({
  level: z.nativeEnum(NotificationLevel),
  text: z.string(),
});

export const teamSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
});

export type TeamView = z.infer<typeof teamSchema>;

/** Keys the dispatcher seeds into every render */
export const baseValuesSchema = z.object({
  url: z.string().default("/"),
  is_oob: z.boolean().default(false),
  just_authenticated: z.boolean().default(false),
});

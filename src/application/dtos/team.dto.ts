import { z } from "zod";

/** Form DTOs, validated with Zod */

export const createTeamDto = z.object({
  name: z
    .string({ required_error: "Team name is required" })
    .trim()
    .min(1, "Team name is required")
    .max(100, "Team name must be at most 100 characters"),
});

export type CreateTeamDto = z.infer<typeof createTeamDto>;

export const navSectionDto = z.object({
  section: z
    .string()
    .regex(/^[a-z][a-z0-9-]{0,31}$/, "Unknown section")
    .default("examples"),
});

export type NavSectionDto = z.infer<typeof navSectionDto>;

import { randomUUID } from "node:crypto";

/**
 * Generate a cryptographically random identifier (UUIDv4).
 */
export const generateId = (): string => randomUUID();

import type { AppError } from "../errors/app-error.js";
import type { SessionId, UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: IdentityProvider: who is calling. Authentication happens elsewhere;
 * this only reads the identity an external login already established.
 */
export interface IdentityProvider {
  resolve(sessionId: SessionId): Promise<Result<UserId | null, AppError>>;
}

import type { SessionHandle, SessionStore } from "../../core/ports/session-store.js";
import type { SessionId } from "../../core/types/brand.js";

/** Bind a store to one session id for the lifetime of a request */
export const bindSession = (store: SessionStore, id: SessionId): SessionHandle => ({
  id,
  get: (key) => store.get(id, key),
  set: (key, value) => store.set(id, key, value),
  delete: (key) => store.delete(id, key),
  destroy: () => store.destroy(id),
});

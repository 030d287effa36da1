import type { AppError } from "../errors/app-error.js";
import type { Brand } from "../types/brand.js";
import type { Result } from "../types/result.js";

/** Opaque handle to a registered template; only the engine can mint one. */
export type TemplateRef = Brand<string, "TemplateRef">;

export type RenderValues = Readonly<Record<string, unknown>>;

/**
 * Port: TemplateEngine: turns a template handle plus values into markup.
 */
export interface TemplateEngine {
  /**
   * Resolve a template name to a handle.
   * Throws for unknown names: handle lookups happen while views are wired at
   * boot, so a bad name aborts startup instead of failing a request.
   */
  ref(name: string): TemplateRef;
  has(name: string): boolean;
  render(ref: TemplateRef, values: RenderValues): Result<string, AppError>;
}

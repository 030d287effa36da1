import type { RenderValues } from "../../core/ports/template-engine.js";

export type Shell = "full" | "empty";

/**
 * Per-request values handed to templates.
 * Created by the dispatcher, filled in by handlers, read by the composer.
 */
export interface RenderContext {
  readonly values: Map<string, unknown>;
  readonly shell: Shell;
  readonly justAuthenticated: boolean;
  /** URL the fragment client should push into history */
  historyUrl?: string | undefined;
}

export const createRenderContext = (
  shell: Shell,
  justAuthenticated: boolean,
  seed: Readonly<Record<string, unknown>> = {},
): RenderContext => ({
  values: new Map(Object.entries(seed)),
  shell,
  justAuthenticated,
});

/** Plain copy of the values, with overrides applied last */
export const snapshot = (rc: RenderContext, ...overrides: RenderValues[]): RenderValues => {
  const values: Record<string, unknown> = Object.fromEntries(rc.values);
  values["shell"] = rc.shell;
  for (const extra of overrides) Object.assign(values, extra);
  return values;
};

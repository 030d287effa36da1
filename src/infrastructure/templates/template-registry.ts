import type { z } from "zod";
import { type AppError, renderFailed } from "../../core/errors/app-error.js";
import type { RenderValues, TemplateEngine, TemplateRef } from "../../core/ports/template-engine.js";
import { brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { SafeHtml } from "./html.js";

/**
 * A named template with the shape of the values it reads.
 * Values are parsed before rendering; keys the schema does not name are ignored.
 */
export interface CompiledTemplate {
  readonly name: string;
  render(values: RenderValues): Result<string, AppError>;
}

export const defineTemplate = <S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  render: (values: z.output<S>) => SafeHtml,
): CompiledTemplate => ({
  name,
  render(values: RenderValues): Result<string, AppError> {
    const parsed = schema.safeParse(values);
    if (!parsed.success) {
      return err(renderFailed(name, parsed.error.issues));
    }
    try {
      return ok(render(parsed.data).value);
    } catch (e: unknown) {
      return err(renderFailed(name, e));
    }
  },
});

/**
 * TemplateEngine adapter over a fixed set of compiled templates.
 * The set is closed at construction; duplicate names throw.
 */
export const createTemplateRegistry = (templates: readonly CompiledTemplate[]): TemplateEngine => {
  const byName = new Map<string, CompiledTemplate>();
  for (const template of templates) {
    if (byName.has(template.name)) {
      throw new Error(`Template "${template.name}" is registered twice`);
    }
    byName.set(template.name, template);
  }

  return {
    ref(name: string): TemplateRef {
      if (!byName.has(name)) {
        throw new Error(`Unknown template "${name}"`);
      }
      return brand<string, "TemplateRef">(name);
    },

    has(name: string): boolean {
      return byName.has(name);
    },

    render(ref: TemplateRef, values: RenderValues): Result<string, AppError> {
      const template = byName.get(ref);
      if (!template) return err(renderFailed(ref, "template is not registered"));
      return template.render(values);
    },
  };
};

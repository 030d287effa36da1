import {
  type AppError,
  cancelled,
  duplicateTarget,
  protocolViolation,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RenderValues, TemplateEngine, TemplateRef } from "../../core/ports/template-engine.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { RequestContext } from "../context.js";
import { TargetId, TemplateName } from "../templates/names.js";
import type { RenderContext } from "./render-context.js";
import { snapshot } from "./render-context.js";
import { HTML_CONTENT_TYPE } from "./view-dispatcher.js";

/** A block addressed to one element of the page */
export interface FragmentSpec {
  readonly targetId: string;
  /** `null` renders nothing, e.g. a toast-only response */
  readonly template: TemplateRef | null;
  /** Values for this block only, layered over the render context */
  readonly values?: RenderValues;
}

export interface FragmentDescriptor {
  readonly targetId: string;
  readonly template: TemplateRef | null;
  readonly isPrimary: boolean;
}

export interface ComposeOptions {
  readonly primary: FragmentSpec;
  readonly secondary?: readonly FragmentSpec[];
  /** Falls back to `rc.historyUrl` */
  readonly pushUrl?: string | undefined;
  /** Fold queued notifications into the toast area. Default on. */
  readonly foldNotifications?: boolean;
  /** Refresh the navigation marker for this section */
  readonly activeSection?: string | undefined;
  /** Refresh the modal container */
  readonly includeModals?: boolean;
}

export interface ComposedFragment {
  readonly body: string;
  readonly pushUrl: string | null;
  /** Blocks in output order, primary first */
  readonly blocks: readonly FragmentDescriptor[];
}

export interface FragmentComposer {
  /** Fails unless the request carries the fragment marker */
  assertFragmentRequest(ctx: RequestContext): Result<void, AppError>;
  compose(
    ctx: RequestContext,
    rc: RenderContext,
    options: ComposeOptions,
  ): Result<ComposedFragment, AppError>;
  render(ctx: RequestContext, rc: RenderContext, options: ComposeOptions): Result<Response, AppError>;
}

interface Deps {
  readonly engine: TemplateEngine;
  readonly logger: Logger;
  /** Duplicate targets fail the request unless lenient; lenient keeps the first */
  readonly lenientDuplicates: boolean;
}

const SWAP_MARKER = 'hx-swap-oob="true"';

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input", "link", "meta", "source", "track", "wbr",
]);

/** Offset just past the close of the element whose opening tag ends at `openEnd`, or -1 */
const elementEnd = (markup: string, tag: string, openEnd: number): number => {
  const tags = new RegExp(`<(/?)${escapeRegExp(tag)}(?=[\\s/>])[^>]*>`, "gi");
  tags.lastIndex = openEnd;
  let depth = 1;
  for (let match = tags.exec(markup); match !== null; match = tags.exec(markup)) {
    if (match[1] === "/") depth--;
    else if (!match[0].endsWith("/>")) depth++;
    if (depth === 0) return match.index + match[0].length;
  }
  return -1;
};

/**
 * Mark a rendered block for out-of-band swapping into `targetId`.
 * When the block is a single top-level element carrying that id, the marker
 * goes on that element; anything else is wrapped in a container with the id.
 */
export const wrapOutOfBand = (markup: string, targetId: string): string => {
  const trimmed = markup.trim();
  const opening = /^<([A-Za-z][\w-]*)([^>]*)>/.exec(trimmed);
  if (opening) {
    const tag = opening[1] ?? "";
    const attrs = opening[2] ?? "";
    const carriesId = new RegExp(`\\sid=(["'])${escapeRegExp(targetId)}\\1`).test(attrs);
    const selfClosing = attrs.endsWith("/");
    const openEnd = opening[0].length;
    const end =
      selfClosing || VOID_ELEMENTS.has(tag.toLowerCase())
        ? openEnd
        : elementEnd(trimmed, tag, openEnd);

    if (carriesId && end === trimmed.length) {
      if (attrs.includes("hx-swap-oob=")) return trimmed;
      const marked = selfClosing
        ? `<${tag}${attrs.slice(0, -1).trimEnd()} ${SWAP_MARKER} />`
        : `<${tag}${attrs} ${SWAP_MARKER}>`;
      return marked + trimmed.slice(openEnd);
    }
  }
  return `<div id="${targetId}" ${SWAP_MARKER}>${markup}</div>`;
};

export const createFragmentComposer = (deps: Deps): FragmentComposer => {
  const { engine, logger, lenientDuplicates } = deps;
  const toasts = engine.ref(TemplateName.TOASTS);
  const navMarker = engine.ref(TemplateName.NAV_MARKER);
  const modals = engine.ref(TemplateName.MODAL_CONTAINER);

  const assertFragmentRequest = (ctx: RequestContext): Result<void, AppError> =>
    ctx.isFragment ? ok(undefined) : err(protocolViolation(ctx.path));

  const renderBlock = (
    template: TemplateRef | null,
    values: RenderValues,
  ): Result<string, AppError> => (template === null ? ok("") : engine.render(template, values));

  const compose = (
    ctx: RequestContext,
    rc: RenderContext,
    options: ComposeOptions,
  ): Result<ComposedFragment, AppError> => {
    const checked = assertFragmentRequest(ctx);
    if (!checked.ok) return checked;
    if (ctx.signal.aborted) return err(cancelled());

    const extra: Record<string, unknown> = {};
    if (options.activeSection !== undefined) extra["active_section"] = options.activeSection;

    const { primary } = options;
    const head = renderBlock(
      primary.template,
      snapshot(rc, extra, primary.values ?? {}, { is_oob: false }),
    );
    if (!head.ok) return head;

    // Explicit blocks first, then navigation, modal container, notifications
    const queued = ctx.notifications.entries();
    const foldToasts = (options.foldNotifications ?? true) && queued.length > 0;
    // An explicit toast block takes the place of the synthesized one
    let toastSpec: FragmentSpec | null = null;
    const requested: FragmentSpec[] = [];
    for (const item of options.secondary ?? []) {
      if (foldToasts && toastSpec === null && item.targetId === TargetId.TOASTS) {
        toastSpec = { ...item, values: { messages: queued, ...item.values } };
        requested.push(toastSpec);
      } else {
        requested.push(item);
      }
    }
    if (options.activeSection !== undefined) {
      requested.push({ targetId: TargetId.NAV_MARKER, template: navMarker });
    }
    if (options.includeModals === true) {
      requested.push({ targetId: TargetId.MODALS, template: modals });
    }
    if (foldToasts && toastSpec === null) {
      toastSpec = { targetId: TargetId.TOASTS, template: toasts, values: { messages: queued } };
      requested.push(toastSpec);
    }

    const seen = new Set<string>([primary.targetId]);
    const blocks: FragmentDescriptor[] = [
      { targetId: primary.targetId, template: primary.template, isPrimary: true },
    ];
    let body = head.value;
    let toastsSent = false;

    for (const item of requested) {
      if (seen.has(item.targetId)) {
        if (!lenientDuplicates) return err(duplicateTarget(item.targetId));
        logger.warn("Duplicate fragment target dropped", { targetId: item.targetId, path: ctx.path });
        continue;
      }
      seen.add(item.targetId);

      if (ctx.signal.aborted) return err(cancelled());
      const rendered = renderBlock(
        item.template,
        snapshot(rc, extra, item.values ?? {}, { is_oob: true }),
      );
      if (!rendered.ok) return rendered;

      body += `\n${wrapOutOfBand(rendered.value, item.targetId)}`;
      blocks.push({ targetId: item.targetId, template: item.template, isPrimary: false });
      if (item === toastSpec) toastsSent = true;
    }

    // Only a finished composition consumes the notifications it delivered
    if (toastsSent) ctx.notifications.drainAll();

    return ok({ body, pushUrl: options.pushUrl ?? rc.historyUrl ?? null, blocks });
  };

  return {
    assertFragmentRequest,
    compose,

    render(ctx, rc, options): Result<Response, AppError> {
      const composed = compose(ctx, rc, options);
      if (!composed.ok) return composed;

      const headers = new Headers({ "Content-Type": HTML_CONTENT_TYPE });
      if (composed.value.pushUrl !== null) headers.set("HX-Push-Url", composed.value.pushUrl);
      return ok(new Response(composed.value.body, { status: 200, headers }));
    },
  };
};

import { z } from "zod";
import { html, raw } from "../../infrastructure/templates/html.js";
import { defineTemplate } from "../../infrastructure/templates/template-registry.js";
import { NAV_SECTIONS, navMarker, toastList } from "./components.js";
import { TargetId, TemplateName } from "./names.js";
import { notificationSchema } from "./schemas.js";

const shellSchema = z.object({
  content: z.string(),
  title: z.string().default("Fragment Composer"),
  messages: z.array(notificationSchema).default([]),
  active_section: z.string().optional(),
});

/** Full document: navigation, swap targets and the page body */
export const baseLayout = defineTemplate(TemplateName.LAYOUT_BASE, shellSchema, (v) =>
  html`<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${v.title}</title>
<meta name="htmx-config" content='{"responseHandling":[{"code":"204","swap":false},{"code":"[23]..","swap":true},{"code":"[45]..","swap":true,"error":true}]}'>
<script src="https://unpkg.com/htmx.org@2.0.3" defer></script>
</head>
<body>
<nav id="nav">
${NAV_SECTIONS.map(
  (s) =>
    html`<a href="${s.href}" data-section="${s.section}"${s.section === v.active_section ? html` aria-current="page"` : ""}>${s.label}</a>
`,
)}${navMarker(v.active_section)}
</nav>
<div id="${TargetId.TOASTS}">${toastList(v.messages)}</div>
<main id="${TargetId.MAIN}">
${raw(v.content)}
</main>
<div id="${TargetId.MODALS}"></div>
</body>
</html>
`,
);

/**
 * Body only. Notifications still queued when a plain partial is rendered
 * travel out of band so the toast area stays current.
 */
export const partialLayout = defineTemplate(TemplateName.LAYOUT_PARTIAL, shellSchema, (v) =>
  html`${raw(v.content)}${
    v.messages.length > 0
      ? html`
<div id="${TargetId.TOASTS}" hx-swap-oob="true">${toastList(v.messages)}</div>`
      : ""
  }`,
);

export const toasts = defineTemplate(
  TemplateName.TOASTS,
  z.object({ messages: z.array(notificationSchema).default([]) }),
  (v) => toastList(v.messages),
);

export const navMarkerTemplate = defineTemplate(
  TemplateName.NAV_MARKER,
  z.object({ active_section: z.string().optional() }),
  (v) => navMarker(v.active_section),
);

export const modalContainer = defineTemplate(
  TemplateName.MODAL_CONTAINER,
  z.object({
    modal: z.object({ title: z.string(), body: z.string() }).optional(),
  }),
  (v) =>
    html`<div id="${TargetId.MODALS}">${
      v.modal
        ? html`<div class="modal" role="dialog" aria-modal="true"><h2>${v.modal.title}</h2><p>${v.modal.body}</p></div>`
        : ""
    }</div>`,
);

import type { z } from "zod";
import { type SafeHtml, html } from "../../infrastructure/templates/html.js";
import { TargetId } from "./names.js";
import type { TeamView, notificationSchema } from "./schemas.js";

type NotificationView = z.infer<typeof notificationSchema>;

export const NAV_SECTIONS = [
  { section: "home", label: "Home", href: "/" },
  { section: "dashboard", label: "Dashboard", href: "/dashboard" },
  { section: "teams", label: "New team", href: "/teams/new" },
  { section: "examples", label: "Examples", href: "/examples" },
] as const;

export const toastList = (messages: readonly NotificationView[]): SafeHtml =>
  html`${messages.map(
    (m) => html`<div class="toast toast-${m.level}" role="status">${m.text}</div>`,
  )}`;

export const navMarker = (activeSection: string | undefined): SafeHtml =>
  html`<span id="${TargetId.NAV_MARKER}" data-active-section="${activeSection ?? ""}" hidden></span>`;

export const teamHeader = (team: TeamView): SafeHtml =>
  html`<header id="${TargetId.TEAM_HEADER}" class="team-header">
  <span class="team-name">${team.name}</span> <code>${team.slug}</code>
</header>`;

/**
 * Team links. With a current team they swap the team panel in place;
 * elsewhere they are plain navigations.
 */
export const teamSwitcher = (teams: readonly TeamView[], currentId?: string): SafeHtml =>
  html`<ul class="team-switcher">${teams.map((t) =>
    currentId === undefined
      ? html`<li><a href="/teams/${t.id}/">${t.name}</a></li>`
      : html`<li${t.id === currentId ? html` class="current"` : ""}><a href="/teams/${t.id}/" hx-get="/teams/${t.id}/switch" hx-target="#${TargetId.TEAM_PANEL}">${t.name}</a></li>`,
  )}</ul>`;

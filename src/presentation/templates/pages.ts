import { z } from "zod";
import { html } from "../../infrastructure/templates/html.js";
import { defineTemplate } from "../../infrastructure/templates/template-registry.js";
import { teamHeader, teamSwitcher } from "./components.js";
import { TargetId, TemplateName } from "./names.js";
import { baseValuesSchema, teamSchema } from "./schemas.js";

const errorSchema = z.object({
  status: z.number().int(),
  title: z.string(),
  message: z.string(),
  request_id: z.string(),
});

export const errorPage = defineTemplate(TemplateName.ERROR_PAGE, errorSchema, (v) =>
  html`<article class="error-page">
<h1>${v.status} · ${v.title}</h1>
<p>${v.message}</p>
<p><small>Reference: ${v.request_id}</small></p>
<p><a href="/">Back to the start page</a></p>
</article>`,
);

/** Fallback shown in place of a fragment that could not be composed */
export const errorFragment = defineTemplate(TemplateName.ERROR_FRAGMENT, errorSchema, (v) =>
  html`<div class="alert alert-error" role="alert"><strong>${v.title}</strong> ${v.message} <small>(${v.request_id})</small></div>`,
);

export const home = defineTemplate(
  TemplateName.HOME,
  baseValuesSchema.extend({
    user_id: z.string().nullable().default(null),
    teams: z.array(teamSchema).default([]),
  }),
  (v) =>
    html`<section class="home">
${v.just_authenticated ? html`<p class="welcome">Welcome back!</p>` : ""}
<h1>Teams</h1>
${
  v.user_id === null
    ? html`<p>You are not signed in.</p>`
    : v.teams.length === 0
      ? html`<p>You are not a member of any team yet. <a href="/teams/new">Create one</a>.</p>`
      : teamSwitcher(v.teams)
}
</section>`,
);

const teamPanelSchema = baseValuesSchema.extend({
  tenant: teamSchema,
  tenant_source: z.string(),
  teams: z.array(teamSchema).default([]),
});

const teamPanel = (v: z.output<typeof teamPanelSchema>) =>
  html`<h1>${v.tenant.name}</h1>
<p class="tenant-source" data-source="${v.tenant_source}">Switch team:</p>
${teamSwitcher(v.teams, v.tenant.id)}`;

export const teamDashboard = defineTemplate(TemplateName.TEAM_DASHBOARD, teamPanelSchema, (v) =>
  html`${teamHeader(v.tenant)}
<section id="${TargetId.TEAM_PANEL}" class="dashboard" data-tenant="${v.tenant.id}">
${teamPanel(v)}
</section>`,
);

/** Panel body alone, swapped into the dashboard when switching teams */
export const teamPanelTemplate = defineTemplate(TemplateName.TEAM_PANEL, teamPanelSchema, teamPanel);

export const teamCreate = defineTemplate(
  TemplateName.TEAM_CREATE,
  baseValuesSchema.extend({
    name: z.string().default(""),
    errors: z.array(z.string()).default([]),
  }),
  (v) =>
    html`<section class="team-create">
<h1>Create a team</h1>
${
  v.errors.length > 0
    ? html`<ul class="form-errors">${v.errors.map((e) => html`<li>${e}</li>`)}</ul>`
    : ""
}
<form method="post" action="/teams">
<label for="team-name">Name</label>
<input id="team-name" name="name" value="${v.name}" required maxlength="100">
<button type="submit">Create</button>
</form>
</section>`,
);

export const teamHeaderTemplate = defineTemplate(
  TemplateName.TEAM_HEADER,
  z.object({ tenant: teamSchema }),
  (v) => teamHeader(v.tenant),
);

export const examples = defineTemplate(TemplateName.EXAMPLES, baseValuesSchema, () =>
  html`<section class="examples">
<h1>Fragment examples</h1>
<button hx-get="/examples/toast" hx-target="#${TargetId.EXAMPLE_OUTPUT}">Show a toast</button>
<button hx-get="/examples/modal" hx-target="#${TargetId.EXAMPLE_OUTPUT}">Open a modal</button>
<button hx-get="/examples/nav?section=examples" hx-target="#${TargetId.EXAMPLE_OUTPUT}">Mark navigation</button>
<div id="${TargetId.EXAMPLE_OUTPUT}"></div>
</section>`,
);

export const exampleResult = defineTemplate(
  TemplateName.EXAMPLE_RESULT,
  z.object({ message: z.string() }),
  (v) => html`<p class="example-result">${v.message}</p>`,
);

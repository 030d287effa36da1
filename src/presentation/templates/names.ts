/** Registered template names */
export const TemplateName = {
  LAYOUT_BASE: "layout/base",
  LAYOUT_PARTIAL: "layout/partial",
  TOASTS: "layout/toasts",
  NAV_MARKER: "layout/nav-marker",
  MODAL_CONTAINER: "layout/modal-container",
  ERROR_PAGE: "pages/error",
  ERROR_FRAGMENT: "fragments/error",
  HOME: "pages/home",
  TEAM_DASHBOARD: "pages/team-dashboard",
  TEAM_PANEL: "fragments/team-panel",
  TEAM_CREATE: "pages/team-create",
  TEAM_HEADER: "fragments/team-header",
  EXAMPLES: "pages/examples",
  EXAMPLE_RESULT: "fragments/example-result",
} as const;

export type TemplateName = (typeof TemplateName)[keyof typeof TemplateName];

/** Element ids the shell exposes as swap targets */
export const TargetId = {
  MAIN: "main-content",
  NAV_MARKER: "nav-active-marker",
  TOASTS: "toast-container",
  MODALS: "modal-container",
  TEAM_HEADER: "team-header",
  TEAM_PANEL: "team-panel",
  EXAMPLE_OUTPUT: "example-output",
} as const;

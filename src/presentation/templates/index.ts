import type { CompiledTemplate } from "../../infrastructure/templates/template-registry.js";
import { baseLayout, modalContainer, navMarkerTemplate, partialLayout, toasts } from "./layout.js";
import {
  errorFragment,
  errorPage,
  exampleResult,
  examples,
  home,
  teamCreate,
  teamDashboard,
  teamHeaderTemplate,
  teamPanelTemplate,
} from "./pages.js";

export { TargetId, TemplateName } from "./names.js";

export const templates: readonly CompiledTemplate[] = [
  baseLayout,
  partialLayout,
  toasts,
  navMarkerTemplate,
  modalContainer,
  errorPage,
  errorFragment,
  home,
  teamDashboard,
  teamCreate,
  teamHeaderTemplate,
  teamPanelTemplate,
  examples,
  exampleResult,
];

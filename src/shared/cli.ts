import { networkInterfaces } from "node:os";
import type { AppConfig } from "../infrastructure/config/config.js";

// ── ANSI escape sequences (zero dependencies) ──────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;

const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const magenta = (s: string) => `${esc("35")}${s}${reset}`;
const blue = (s: string) => `${esc("34")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgMagenta = (s: string) => `${esc("45")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const pad = (s: string, len: number): string => s.padEnd(len);

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
    default:
      return bgMagenta(env.toUpperCase());
  }
};

const methodColor = (method: string): string => {
  switch (method) {
    case "GET":
      return green(bold(pad(method, 7)));
    case "POST":
      return cyan(bold(pad(method, 7)));
    case "PATCH":
      return yellow(bold(pad(method, 7)));
    case "PUT":
      return yellow(bold(pad(method, 7)));
    case "DELETE":
      return red(bold(pad(method, 7)));
    default:
      return white(bold(pad(method, 7)));
  }
};

// ── Route table ─────────────────────────────────────────────────────────

interface RouteInfo {
  readonly method: string;
  readonly path: string;
  /** Only reachable through fragment requests */
  readonly fragment: boolean;
  readonly description: string;
}

const routes: readonly RouteInfo[] = [
  { method: "GET", path: "/health", fragment: false, description: "Shallow health check" },
  { method: "GET", path: "/readiness", fragment: false, description: "Session store probe" },
  { method: "GET", path: "/", fragment: false, description: "Start page" },
  { method: "GET", path: "/dashboard", fragment: false, description: "Active team dashboard" },
  { method: "GET", path: "/teams/new", fragment: false, description: "Team creation form" },
  { method: "POST", path: "/teams", fragment: false, description: "Create a team" },
  { method: "GET", path: "/teams/:id/", fragment: false, description: "Team dashboard" },
  { method: "GET", path: "/teams/:id/switch", fragment: true, description: "Switch team in place" },
  { method: "GET", path: "/examples", fragment: false, description: "Fragment examples" },
  { method: "GET", path: "/examples/toast", fragment: true, description: "Toast only" },
  { method: "GET", path: "/examples/modal", fragment: true, description: "Modal container" },
  { method: "GET", path: "/examples/nav", fragment: true, description: "Navigation marker" },
];

// ── ASCII Logo ──────────────────────────────────────────────────────────

const logo = (): string => {
  const lines = [
    `${bold(cyan("  ┌─────────────────────────────────────────┐"))}`,
    `${bold(cyan("  │"))}                                         ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${bold(white("▦ fragment-composer"))}  ${dim(gray("v0.1.0"))}           ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Server-rendered pages and fragments"))}   ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}                                         ${bold(cyan("│"))}`,
    `${bold(cyan("  └─────────────────────────────────────────┘"))}`,
  ];
  return lines.join("\n");
};

// ── Public API ──────────────────────────────────────────────────────────

interface StartupInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
}

/**
 * Prints a beautiful startup banner to stdout.
 * Called once after the server is fully initialized.
 */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, bootTimeMs } = info;

  const localUrl = `http://localhost:${config.port}`;
  const networkUrl = `http://${config.host === "0.0.0.0" ? getLocalIp() : config.host}:${config.port}`;

  const lines: string[] = [];

  lines.push("");
  lines.push(logo());
  lines.push("");

  // ── Server info ──
  lines.push(`  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(formatUptime(bootTimeMs)))}`);
  lines.push("");

  // ── URLs ──
  lines.push(`  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(localUrl))}`);
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(networkUrl))}`);
  }
  lines.push("");

  // ── Process info ──
  lines.push(`  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`);
  lines.push(`  ${gray("├─")} ${dim("Runtime")}       ${magenta(`Node ${process.versions.node}`)}`);
  lines.push(`  ${gray("├─")} ${dim("Store")}         ${blue(config.store.driver)}`);
  lines.push(`  ${gray("├─")} ${dim("Session TTL")}   ${white(`${Math.round(config.session.ttlMs / 3_600_000)}h`)}`);
  if (config.devUserId !== undefined) {
    lines.push(`  ${gray("├─")} ${dim("Identity")}      ${yellow(`fixed caller ${config.devUserId}`)}`);
  }
  lines.push(`  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`);
  lines.push("");

  // ── Routes ──
  lines.push(`  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`);
  lines.push(`  ${gray("─".repeat(60))}`);

  for (const route of routes) {
    const lock = route.fragment ? magenta("HX") : "  ";
    const desc = dim(gray(route.description));
    lines.push(`  ${lock} ${methodColor(route.method)} ${pad(route.path, 30)} ${desc}`);
  }

  lines.push(`  ${gray("─".repeat(60))}`);
  lines.push("");

  // ── Help ──
  lines.push(`  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`);
  lines.push("");

  process.stdout.write(lines.join("\n") + "\n");
};

/**
 * Prints a clean shutdown message.
 */
export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down gracefully…")}\n\n`
  );
};

/**
 * Prints a beautiful config validation error with hints.
 */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: set the variables in the environment, for example:")}`);
  lines.push(`  ${cyan("$ STORE_DRIVER=memory DEV_USER_ID=dev-user npm run dev")}`);
  lines.push("");

  process.stderr.write(lines.join("\n") + "\n");
};

// ── Utilities ───────────────────────────────────────────────────────────

const getLocalIp = (): string => {
  const nets = networkInterfaces();
  for (const entries of Object.values(nets)) {
    for (const net of entries ?? []) {
      if (net.family === "IPv4" && !net.internal) return net.address;
    }
  }
  return "0.0.0.0";
};

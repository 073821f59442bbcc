/**
 * Debug Channels
 *
 * One channel per generator stage. A disabled channel is a no-op, so stages
 * call them unconditionally:
 *
 * ```typescript
 * debug.order("forward-reference", { from, to, cycle });
 * debug.imports("resolved", { consumers: 3, names });
 * ```
 *
 * Channels are chosen by the RPCFORGE_DEBUG environment variable (or the
 * CLI's `--debug` flag):
 *
 * ```bash
 * RPCFORGE_DEBUG=order npm test          # Just the dependency orderer
 * RPCFORGE_DEBUG=order,imports npm test  # Multiple channels
 * RPCFORGE_DEBUG=* npm test              # Everything
 * ```
 */

export const DEBUG_ENV_VAR = "RPCFORGE_DEBUG";

export const DEBUG_CHANNELS = ["model", "definitions", "messages", "order", "imports", "emit", "cli"] as const;

export type DebugChannelName = (typeof DEBUG_CHANNELS)[number];

/** Values the stages report: names, counts, flags, and lists of them. */
export type DebugValue = string | number | boolean | null | readonly DebugValue[];

export type DebugData = Readonly<Record<string, DebugValue>>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `pretty`: `[order.ordered] definitions=4 deviations=1`; `json`: one object per line */
  format: "pretty" | "json";
  /** Defaults to console.error so stdout stays free for generated output */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  output: console.error,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

/* =============================================================================
 * ACTIVATION
 * ============================================================================= */

/** `""`, `0` and `false` enable nothing; `*`, `1` and `true` enable everything. */
function parseChannelList(list: string): ReadonlySet<string> | "all" {
  const value = list.trim();
  if (!value || value === "0" || value === "false") return new Set();
  if (value === "*" || value === "1" || value === "true") return "all";
  return new Set(value.split(",").map(name => name.trim().toLowerCase()));
}

const noop: DebugChannel = () => {};

function createChannels(list: string): Record<DebugChannelName, DebugChannel> {
  const enabled = parseChannelList(list);
  const channel = (name: DebugChannelName): DebugChannel =>
    enabled === "all" || enabled.has(name) ? emitter(name) : noop;
  return {
    model: channel("model"),
    definitions: channel("definitions"),
    messages: channel("messages"),
    order: channel("order"),
    imports: channel("imports"),
    emit: channel("emit"),
    cli: channel("cli"),
  };
}

function emitter(channel: DebugChannelName): DebugChannel {
  return (point, data) => {
    config.output(config.format === "json" ? formatJson(channel, point, data) : formatPretty(channel, point, data));
  };
}

/**
 * Debug channels for each generator stage.
 */
export const debug: Record<DebugChannelName, DebugChannel> = createChannels(process.env[DEBUG_ENV_VAR] ?? "");

/**
 * Re-select the enabled channels from `channels`, or from RPCFORGE_DEBUG when
 * no list is given.
 */
export function refreshDebugChannels(channels?: string): void {
  Object.assign(debug, createChannels(channels ?? process.env[DEBUG_ENV_VAR] ?? ""));
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/* =============================================================================
 * FORMATTING
 * ============================================================================= */

/** Lists longer than this print their head and a count. */
const MAX_LIST_ITEMS = 8;

function formatPretty(channel: string, point: string, data: DebugData | undefined): string {
  const label = `[${channel}.${point}]`;
  const fields = (data ? Object.entries(data) : []).map(([key, value]) => `${key}=${formatValue(value)}`);
  return fields.length === 0 ? label : `${label} ${fields.join(" ")}`;
}

function formatValue(value: DebugValue): string {
  if (typeof value === "string") {
    return /^[^\s="[\],]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value === null || typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  const shown = value.slice(0, MAX_LIST_ITEMS).map(formatValue);
  if (value.length > MAX_LIST_ITEMS) shown.push(`+${value.length - MAX_LIST_ITEMS} more`);
  return `[${shown.join(", ")}]`;
}

function formatJson(channel: string, point: string, data: DebugData | undefined): string {
  return JSON.stringify(data === undefined ? { channel, point } : { channel, point, data });
}

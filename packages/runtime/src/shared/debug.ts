/**
 * Debug Channels
 *
 * One channel per stage: what the tokenizer produced, which plans a render
 * skipped, which components mounted, what ended up in a patch.
 *
 * ```bash
 * TESSERA_DEBUG=diff npm test
 * TESSERA_DEBUG=render,session npm test
 * TESSERA_DEBUG=* npm test
 * ```
 *
 * or at run time with `configureDebug({ channels: ["diff"] })`. A disabled
 * channel is a no-op and never calls a lazy payload:
 *
 * ```typescript
 * debug.render("plan.skip", { position });
 * debug.diff("snapshot", () => ({ removed: countRemoved(patch) }));
 * ```
 */

export type DebugData = Readonly<Record<string, unknown>>;

/** A payload, or a function building it only when the channel is on. */
export type DebugPayload = DebugData | (() => DebugData);

export type DebugChannel = (point: string, data?: DebugPayload) => void;

const DEBUG_CHANNELS = ["lex", "parse", "build", "verify", "render", "diff", "session"] as const;

export type DebugChannelName = (typeof DEBUG_CHANNELS)[number];

export interface DebugConfig {
  format: "json" | "pretty";
  /** Defaults to console.log */
  output: (message: string) => void;
  /** Channels to enable; `null` reads TESSERA_DEBUG. `"*"` enables all. */
  channels: readonly string[] | null;
}

let config: DebugConfig = { format: "pretty", output: console.log, channels: null };
let enabled = enabledChannels();

function enabledChannels(): ReadonlySet<string> {
  if (config.channels) return new Set(config.channels.map((name) => name.trim().toLowerCase()));
  const env = (process.env["TESSERA_DEBUG"] ?? "").trim();
  if (env === "" || env === "0" || env === "false") return new Set();
  if (env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((name) => name.trim().toLowerCase()).filter((name) => name.length > 0));
}

/** Whether `channel` logs, or without one, whether any channel does. */
export function isDebugEnabled(channel?: DebugChannelName): boolean {
  if (channel === undefined) return enabled.size > 0;
  return enabled.has("*") || enabled.has(channel);
}

function formatMessage(channel: DebugChannelName, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify(data ? { channel, point, data } : { channel, point });
  }
  const label = `[${channel}.${point}]`;
  const fields = data ? Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`) : [];
  return fields.length === 0 ? label : `${label} ${fields.join(" ")}`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value.length > 60 ? `${value.slice(0, 57)}...` : value);
  }
  if (Array.isArray(value)) {
    return value.length <= 4 ? `[${value.map(formatValue).join(",")}]` : `[${value.length} items]`;
  }
  if (value !== null && typeof value === "object") return "{...}";
  return String(value);
}

function createChannel(name: DebugChannelName): DebugChannel {
  if (!isDebugEnabled(name)) return () => {};
  return (point, data) => {
    config.output(formatMessage(name, point, typeof data === "function" ? data() : data));
  };
}

function createChannels(): Record<DebugChannelName, DebugChannel> {
  return {
    lex: createChannel("lex"),
    parse: createChannel("parse"),
    build: createChannel("build"),
    verify: createChannel("verify"),
    render: createChannel("render"),
    diff: createChannel("diff"),
    session: createChannel("session"),
  };
}

export const debug: Record<DebugChannelName, DebugChannel> = createChannels();

export type Debug = typeof debug;

/**
 * Change the output, format or enabled channels. Channels are rebuilt, so
 * `channels: null` re-reads TESSERA_DEBUG.
 */
export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
  enabled = enabledChannels();
  Object.assign(debug, createChannels());
}

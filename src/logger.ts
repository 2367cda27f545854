/**
 * Terminal logger.
 *
 * Everything goes to stderr: stdout is reserved for the outcome line (CLI) or
 * MCP traffic (server).
 */

import type { LogLevel } from "./config.js";

export type { LogLevel };

/** ANSI escape codes for colors and styles. */
const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
} as const;

/** Box-drawing characters for the startup banner. */
const BOX = {
  topLeft: "╔",
  topRight: "╗",
  bottomLeft: "╚",
  bottomRight: "╝",
  horizontal: "═",
  vertical: "║",
} as const;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Destination for rendered log lines. */
export type LogSink = (chunk: string) => void;

const stderrSink: LogSink = (chunk) => {
  process.stderr.write(chunk);
};

/**
 * Strip ANSI escape codes from a string to get its display length.
 */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Render a boxed section with a centered title and dynamic width.
 */
function renderBox(title: string, content: string[], color: string = ANSI.cyan): string {
  const lines: string[] = [];

  // innerWidth counts the characters between the vertical borders; each content
  // line is rendered as "║ <content><pad> ║".
  const titleText = ` ${title} `;
  const maxContentLen = content.reduce((max, line) => {
    const len = stripAnsi(line).length;
    return len > max ? len : max;
  }, 0);
  const innerWidth = Math.max(maxContentLen + 2, titleText.length);

  const remainingWidth = innerWidth - titleText.length;
  const leftPad = Math.floor(remainingWidth / 2);
  const rightPad = remainingWidth - leftPad;

  lines.push(
    `${color}${BOX.topLeft}${BOX.horizontal.repeat(leftPad)}${ANSI.bold}${titleText}${ANSI.reset}${color}${BOX.horizontal.repeat(rightPad)}${BOX.topRight}${ANSI.reset}`
  );

  for (const line of content) {
    const padding = Math.max(0, innerWidth - (stripAnsi(line).length + 2));
    lines.push(
      `${color}${BOX.vertical}${ANSI.reset} ${line}${" ".repeat(padding)} ${color}${BOX.vertical}${ANSI.reset}`
    );
  }

  lines.push(
    `${color}${BOX.bottomLeft}${BOX.horizontal.repeat(innerWidth)}${BOX.bottomRight}${ANSI.reset}`
  );

  return lines.join("\n");
}

function formatTimestamp(): string {
  const now = new Date();
  const h = String(now.getHours()).padStart(2, "0");
  const m = String(now.getMinutes()).padStart(2, "0");
  const s = String(now.getSeconds()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${ANSI.dim}${ANSI.gray}${h}:${m}:${s}.${ms}${ANSI.reset}`;
}

function getLevelIndicator(level: LogLevel): string {
  switch (level) {
    case "debug":
      return `${ANSI.dim}${ANSI.blue}[DEBUG]${ANSI.reset}`;
    case "info":
      return `${ANSI.cyan}[INFO ]${ANSI.reset}`;
    case "warn":
      return `${ANSI.yellow}[WARN ]${ANSI.reset}`;
    case "error":
      return `${ANSI.red}[ERROR]${ANSI.reset}`;
  }
}

/**
 * Logger instance with configurable minimum level.
 */
export class Logger {
  private minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = stderrSink) {
    this.minLevel = minLevel;
    this.sink = sink;
  }

  /**
   * Print the MCP server startup banner.
   */
  printBanner(info: { name: string; version: string; serverUrl: string }): void {
    const configLines = [
      `${ANSI.cyan}version${ANSI.reset}    ${ANSI.white}${info.version}${ANSI.reset}`,
      `${ANSI.cyan}jamf${ANSI.reset}       ${ANSI.dim}${info.serverUrl}${ANSI.reset}`,
    ];
    const output = [
      "",
      renderBox(info.name.toUpperCase(), configLines),
      "",
      `  ${ANSI.green}${ANSI.bold}◆${ANSI.reset} ${ANSI.green}Server ready${ANSI.reset} ${ANSI.dim}(listening on stdio)${ANSI.reset}`,
      "",
    ];
    this.sink(output.join("\n"));
  }

  /**
   * Log a message at the specified level.
   */
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const parts = [formatTimestamp(), getLevelIndicator(level), message];

    if (meta && Object.keys(meta).length > 0) {
      parts.push(`${ANSI.dim}${JSON.stringify(meta)}${ANSI.reset}`);
    }

    this.sink(parts.join(" ") + "\n");
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}

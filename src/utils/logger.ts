/**
 * rds-diagnostics-mcp - Centralized Logger
 *
 * Structured logging with security-aware sanitization.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Sensitive patterns to redact from logs.
 * Character classes are length-limited to keep matching linear.
 */
const SENSITIVE_PATTERNS = [
  /\bpassword[=:]\s*[^\s,;]{1,100}/gi,
  /\bsecret[=:]\s*[^\s,;]{1,100}/gi,
  /\btoken[=:]\s*[^\s,;]{1,100}/gi,
  /\bauthorization:\s*bearer\s+\S{1,500}/gi,
  /\baws_secret_access_key[=:]\s*[^\s,;]{1,100}/gi,
  // Anthropic API keys
  /\bsk-ant-[A-Za-z0-9_-]{1,200}/g,
  // AWS access key ids
  /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g,
];

/**
 * Maximum length of input to process with regex
 */
const MAX_REDACT_LENGTH = 10000;

/**
 * Redact sensitive information from a string
 */
function redactSensitive(input: string): string {
  if (input.length > MAX_REDACT_LENGTH) {
    return (
      redactSensitive(input.substring(0, MAX_REDACT_LENGTH)) + "...[TRUNCATED]"
    );
  }

  let result = input;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, (match) => {
      // Keep the key part, redact the value
      const colonIndex = match.indexOf(":");
      const equalIndex = match.indexOf("=");
      const delimiterIndex = colonIndex >= 0 ? colonIndex : equalIndex;

      if (delimiterIndex >= 0) {
        return match.substring(0, delimiterIndex + 1) + "[REDACTED]";
      }
      return "[REDACTED]";
    });
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sanitize log context by redacting sensitive values
 */
function sanitizeContext(
  context: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const sensitiveKeys = [
    "password",
    "secret",
    "token",
    "authorization",
    "apikey",
    "api_key",
    "accesskey",
    "access_key",
  ];

  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();

    if (sensitiveKeys.some((k) => lowerKey.includes(k))) {
      result[key] = "[REDACTED]";
    } else if (typeof value === "string") {
      result[key] = redactSensitive(value);
    } else if (isRecord(value)) {
      result[key] = sanitizeContext(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Remove control characters from log messages to prevent log injection
 */
function sanitizeMessage(message: string): string {
  let result = "";
  for (const char of message) {
    const code = char.charCodeAt(0);
    // Printable characters, newlines, tabs and carriage returns; no DEL
    if (
      (code >= 32 && code !== 127) ||
      code === 10 ||
      code === 9 ||
      code === 13
    ) {
      result += char;
    }
  }
  return result;
}

/**
 * Format a log entry for output
 */
function formatEntry(entry: LogEntry): string {
  const prefix = `[rds-diagnostics-mcp]`;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `${prefix} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  return output;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Narrow an arbitrary string to a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.keys(LEVEL_PRIORITY).includes(value);
}

/**
 * Current log level (configurable via environment)
 */
let currentLogLevel: LogLevel = "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLogLevel];
}

/**
 * Core logging function
 */
function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: sanitizeMessage(redactSensitive(message)),
    context: context ? sanitizeContext(context) : undefined,
  };

  // stdout is reserved for MCP JSON-RPC messages
  console.error(formatEntry(entry));
}

/**
 * Logger interface
 */
export const logger = {
  debug: (message: string, context?: Record<string, unknown>) =>
    log("debug", message, context),
  info: (message: string, context?: Record<string, unknown>) =>
    log("info", message, context),
  warn: (message: string, context?: Record<string, unknown>) =>
    log("warn", message, context),
  error: (message: string, context?: Record<string, unknown>) =>
    log("error", message, context),

  /**
   * Set the minimum log level
   */
  setLevel: (level: LogLevel) => {
    currentLogLevel = level;
  },

  getLevel: (): LogLevel => currentLogLevel,
};

const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
  currentLogLevel = envLevel;
}

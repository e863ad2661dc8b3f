/**
 * Structured Logger for the document Q&A service
 * Pretty output in development, JSON lines everywhere else
 */

import type { LogLevel, NodeEnv } from "./types/env.js";

export interface LogContext {
  [key: string]:
    | string
    | number
    | boolean
    | null
    | undefined
    | string[]
    | Record<string, unknown>
    | LogContext;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  version: string;
  environment: string;
  pid: number;
  context: LogContext | undefined;
}

export type SecuritySeverity = "INFO" | "WARNING" | "CRITICAL";

const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

class AppLogger {
  private serviceName = "doc-qa-rag";
  private version = "1.0.0";
  private environment: string = process.env.NODE_ENV || "development";
  private isDevelopment = this.environment === "development";
  private minLevel: LogLevel = "info";

  /**
   * Apply runtime settings once configuration is loaded
   */
  configure(options: { level?: LogLevel; environment?: NodeEnv }): void {
    if (options.level) {
      this.minLevel = options.level;
    }
    if (options.environment) {
      this.environment = options.environment;
      this.isDevelopment = options.environment === "development";
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.minLevel];
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): LogEntry {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      service: this.serviceName,
      version: this.version,
      environment: this.environment,
      pid: process.pid,
      context,
    };
  }

  private output(entry: LogEntry): void {
    if (!this.isLevelEnabled(entry.level)) {
      return;
    }

    if (this.isDevelopment) {
      const timestamp = new Date(entry.timestamp).toLocaleTimeString();
      const levelColor = this.getLevelColor(entry.level);
      const contextStr = entry.context
        ? ` ${JSON.stringify(entry.context)}`
        : "";

      console.log(
        `${levelColor}[${timestamp}] ${entry.level.toUpperCase()}\x1b[0m ${entry.message}${contextStr}`
      );
      return;
    }

    const logData = {
      "@timestamp": entry.timestamp,
      "@level": entry.level,
      "@message": entry.message,
      "@service": entry.service,
      "@version": entry.version,
      "@environment": entry.environment,
      "@pid": entry.pid,
      ...entry.context,
    };

    switch (entry.level) {
      case "error":
        console.error(JSON.stringify(logData));
        break;
      case "warn":
        console.warn(JSON.stringify(logData));
        break;
      case "debug":
        console.debug(JSON.stringify(logData));
        break;
      default:
        console.log(JSON.stringify(logData));
    }
  }

  private getLevelColor(level: LogLevel): string {
    switch (level) {
      case "error":
        return "\x1b[31m"; // Red
      case "warn":
        return "\x1b[33m"; // Yellow
      case "info":
        return "\x1b[36m"; // Cyan
      case "debug":
        return "\x1b[90m"; // Gray
    }
  }

  info(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("info", message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("warn", message, context));
  }

  error(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("error", message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("debug", message, context));
  }

  /**
   * Log request events
   */
  request(method: string, path: string, context?: LogContext): void {
    this.info(`${method} ${path}`, {
      type: "request",
      method,
      path,
      ...context,
    });
  }

  /**
   * Log security events; CRITICAL goes out at error level
   */
  security(
    event: string,
    severity: SecuritySeverity,
    context?: LogContext
  ): void {
    const message = `Security: ${event}`;
    const data: LogContext = { type: "security", event, severity, ...context };

    switch (severity) {
      case "CRITICAL":
        this.error(message, data);
        break;
      case "WARNING":
        this.warn(message, data);
        break;
      default:
        this.info(message, data);
    }
  }

  /**
   * Log an outbound provider call
   */
  apiCall(
    endpoint: string,
    query: string,
    responseTimeMs: number,
    success: boolean
  ): void {
    const context: LogContext = {
      type: "api_call",
      endpoint,
      queryLength: query.length,
      responseTimeMs,
      success,
    };

    if (success) {
      this.info(`API call successful - ${endpoint} - ${responseTimeMs}ms`, context);
    } else {
      this.error(`API call failed - ${endpoint} - ${responseTimeMs}ms`, context);
    }
  }

  /**
   * Log fatal errors that require immediate attention
   */
  fatal(message: string, context?: LogContext): void {
    this.error(`FATAL: ${message}`, {
      type: "fatal",
      severity: "critical",
      ...context,
    });
  }
}

export type Logger = AppLogger;

export const logger = new AppLogger();

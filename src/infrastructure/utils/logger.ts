/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Structured logger for the scheduler.
 *
 * Features:
 * - Console output with colored levels
 * - Memory buffer with periodic file evacuation (JSON Lines)
 * - Category-based logging for subsystem identification
 * - Tick context and agent-scoped entries
 * - Throttling to prevent log spam
 *
 * Environment:
 * - `LOG_LEVEL` minimum level written (default `info`)
 * - `LOG_TO_FILE=false` keeps everything in memory
 * - `LOG_SILENT=true` suppresses console output
 */

import {
  LogLevel,
  LogCategory,
  ALL_LOG_LEVELS,
  isLogCategory,
  isLogLevel,
} from "../../shared/constants/LogEnums";

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  agentId?: string;
  /** Simulation tick when the entry was created */
  tick: number;
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Partial<Record<LogCategory, number>>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: string;
  fromTick?: number;
  toTick?: number;
  /** Case-insensitive text search in message */
  messageContains?: string;
  limit?: number;
}

interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  writeIntervalMs: number;
  toFile: boolean;
  silent: boolean;
}

const envLevel = process.env.LOG_LEVEL;

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: isLogLevel(envLevel) ? envLevel : LogLevel.INFO,
  maxMemoryLogs: 5000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 4000),
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
  toFile: process.env.LOG_TO_FILE !== "false",
  silent: process.env.LOG_SILENT === "true",
};

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private isEvacuating = false;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;
  private entrySeq = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.toFile) {
      this.ensureLogDir();
      setInterval(
        () => this.checkEvacuation(),
        this.config.writeIntervalMs,
      ).unref();
      process.on("beforeExit", () => {
        this.flush().catch((error: unknown) => {
          console.error(
            "Failed to flush logs on exit:",
            error instanceof Error ? error.message : String(error),
          );
        });
      });
    }
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {},
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
  }

  private ensureLogDir(): void {
    try {
      if (!fs.existsSync(this.config.logDir)) {
        fs.mkdirSync(this.config.logDir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private getLogFilePath(): string {
    return path.join(this.config.logDir, `scheduler-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[tick ${this.currentTick}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private isBelowMinLevel(level: LogLevel): boolean {
    return (
      ALL_LOG_LEVELS.indexOf(level) <
      ALL_LOG_LEVELS.indexOf(this.config.minLevel)
    );
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private updateMetrics(entry: LogEntry): void {
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category] =
      (this.metrics.byCategory[entry.category] ?? 0) + 1;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    this.updateMetrics(entry);

    if (!this.config.toFile) {
      if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
        this.memoryBuffer.splice(
          0,
          this.memoryBuffer.length - this.config.maxMemoryLogs,
        );
      }
      return;
    }

    if (this.memoryBuffer.length >= this.config.evacuationThreshold) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (this.isEvacuating || this.memoryBuffer.length === 0) return;

    this.isEvacuating = true;
    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  private checkEvacuation(): void {
    if (this.memoryBuffer.length > 0) {
      this.evacuateToFile();
    }

    const now = Date.now();
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  /**
   * Set the current simulation tick for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  private createEntry(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { agentId?: string; data?: unknown },
  ): LogEntry {
    const now = Date.now();
    this.entrySeq++;
    return {
      id: `${now}-${this.entrySeq}`,
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      agentId: options?.agentId,
      tick: this.currentTick,
      data: options?.data,
    };
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { agentId?: string; data?: unknown },
  ): void {
    if (this.isBelowMinLevel(level)) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const entry = this.createEntry(level, category, message, options);
    this.addToMemory(entry);

    if (this.config.silent) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    const data = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data);
        break;
    }
  }

  private route(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
      return;
    }
    this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.WARN, message, categoryOrData, data);
  }

  /**
   * Errors bypass throttling.
   */
  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log an agent-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, {
      agentId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  /**
   * Query logs still held in the memory buffer.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, agentId, fromTick, toTick, messageContains } =
      filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (agentId === undefined || e.agentId === agentId) &&
        (fromTick === undefined || e.tick >= fromTick) &&
        (toTick === undefined || e.tick <= toTick) &&
        (search === undefined || e.message.toLowerCase().includes(search)),
    );

    return filter.limit ? results.slice(-filter.limit) : results;
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    if (!this.config.toFile) return;
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  /** Drops buffered entries and metrics. */
  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
    this.metrics = this.initMetrics();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

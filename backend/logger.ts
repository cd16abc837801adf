import * as fs from "fs";
import * as path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerConfig {
  logDir: string;
  minLevel?: LogLevel;
  /** Mirror every written line to stderr. */
  echo?: boolean;
}

export class Logger {
  private static instance: Logger | null = null;
  private logFile: string;
  private minLevel: LogLevel;
  private echo: boolean;
  private stream: fs.WriteStream | null = null;

  private constructor(config: LoggerConfig) {
    if (!fs.existsSync(config.logDir)) {
      fs.mkdirSync(config.logDir, { recursive: true });
    }

    this.logFile = path.join(config.logDir, "issue-loop.log");
    this.minLevel = config.minLevel ?? "info";
    this.echo = config.echo ?? false;

    this.stream = fs.createWriteStream(this.logFile, { flags: "a" });
    this.stream.on("error", (error) => {
      process.stderr.write(`Log file ${this.logFile} is no longer writable: ${error.message}\n`);
      this.stream = null;
    });
  }

  static initialize(config: LoggerConfig): Logger {
    if (Logger.instance) {
      Logger.instance.close();
    }
    Logger.instance = new Logger(config);
    return Logger.instance;
  }

  static getInstance(): Logger | null {
    return Logger.instance;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private formatMessage(level: LogLevel, component: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${component}] ${message}`;
  }

  log(level: LogLevel, component: string, message: string): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, component, message);

    if (this.stream) {
      this.stream.write(formattedMessage + "\n");
    }
    if (this.echo) {
      process.stderr.write(formattedMessage + "\n");
    }
  }

  debug(component: string, message: string): void {
    this.log("debug", component, message);
  }

  info(component: string, message: string): void {
    this.log("info", component, message);
  }

  warn(component: string, message: string): void {
    this.log("warn", component, message);
  }

  error(component: string, message: string): void {
    this.log("error", component, message);
  }

  close(): void {
    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }
    if (Logger.instance === this) {
      Logger.instance = null;
    }
  }
}

export function getLogger(): Logger | null {
  return Logger.getInstance();
}

import { LogFields, LogLevel, LogStream, LogThreshold } from "./types";

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogThreshold;
  stream?: LogStream;
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  static silent(component = "test"): Logger {
    return new Logger({ component, runId: "run_silent", level: "silent" });
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.context.level ?? "info"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (level === "error" || this.context.stream === "stderr") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}

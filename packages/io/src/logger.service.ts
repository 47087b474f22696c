import { Injectable } from "@nestjs/common";
import fs from "fs";
import { createRequire } from "module";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "@agentmd/config";

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

const isLogLevel = (value: string | symbol): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

const moduleRequire = createRequire(import.meta.url);

export interface LoggerEvent {
  level: LogLevel;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: LoggingConfig): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    const rawLogger = this.buildLogger(config);
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    const root = this.rootLogger ?? this.configure();
    if (!scope) {
      return root;
    }
    const base = this.rawLogger ?? root;
    return this.wrapLogger(base.child({ scope }));
  }

  withBindings(bindings: Record<string, unknown>): Logger {
    return this.getLogger().child(bindings);
  }

  reset(): void {
    this.rootLogger = null;
    this.rawLogger = null;
    this.cachedSignature = "";
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty =
      destination?.pretty ??
      (destination?.type !== "file" && process.stderr.isTTY === true);
    if (!wantsPretty) return undefined;

    try {
      moduleRequire.resolve("pino-pretty");
    } catch {
      return undefined;
    }

    return {
      target: "pino-pretty",
      options: {
        destination: destination?.type === "stdout" ? 1 : 2,
        colorize: destination?.colorize ?? true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    };
  }

  private prepareDestination(destination?: LoggingDestination) {
    if (!destination) return undefined;

    switch (destination.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(
          destination.path ?? ".agentmd/logs/agentmd.log"
        );
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(config?.destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    const destStream = this.prepareDestination(config?.destination);
    return destStream ? pino(options, destStream) : pino(options);
  }

  private wrapLogger(logger: Logger): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (...args: Parameters<Logger["child"]>) =>
            service.wrapLogger(target.child<never>(...args));
        }

        if (isLogLevel(property)) {
          const original: unknown = Reflect.get(target, property, receiver);
          if (typeof original !== "function") {
            return original;
          }

          return (...args: unknown[]) => {
            service.notify(property, args);
            return Reflect.apply(original, target, args);
          };
        }

        return Reflect.get(target, property, receiver);
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(level: LogLevel, args: unknown[]): void {
    if (this.listeners.size === 0) {
      return;
    }

    const event: LoggerEvent = { level, args };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

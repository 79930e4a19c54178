import { NamedError } from "./error"

/**
 * Tagged, levelled logging to stderr.
 *
 * Usage:
 * ```ts
 * const log = Log.create({ service: "grammar" })
 * log.info("Defined", { nodeKinds: 12 })
 * log.error("Tree invariant violated", { error: new Tree.MalformedTreeError({ ... }) })
 *
 * const timer = log.time("Locating node")
 * // ... work
 * timer.stop()
 * ```
 */
export namespace Log {
  export type Level = "DEBUG" | "INFO" | "WARN" | "ERROR"

  const levelPriority: Record<Level, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
  }

  let currentLevel: Level = "INFO"

  export function setLevel(level: Level) {
    currentLevel = level
  }

  export function getLevel(): Level {
    return currentLevel
  }

  function shouldLog(level: Level): boolean {
    return levelPriority[level] >= levelPriority[currentLevel]
  }

  export interface Logger {
    debug(message?: string, extra?: Record<string, unknown>): void
    info(message?: string, extra?: Record<string, unknown>): void
    warn(message?: string, extra?: Record<string, unknown>): void
    error(message?: string, extra?: Record<string, unknown>): void
    tag(key: string, value: string): Logger
    clone(): Logger
    time(message: string, extra?: Record<string, unknown>): { stop(): void }
  }

  const loggers = new Map<string, Logger>()

  // stderr unless overridden; stdout may carry serialized trees
  let write = (msg: string) => {
    process.stderr.write(msg)
  }

  /**
   * Override the default writer (stderr).
   */
  export function setWriter(fn: (msg: string) => void) {
    write = fn
  }

  function formatData(data: unknown): string {
    if (typeof data === "object" && data !== null) {
      return Object.entries(data)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(" ")
    }
    return String(data)
  }

  function formatError(error: Error, depth = 0): string {
    if (error instanceof NamedError) {
      const obj = error.toObject()
      try {
        return JSON.stringify(obj)
      } catch {
        return `${obj.name}: ${formatData(obj.data)}`
      }
    }

    const result = error.message
    return error.cause instanceof Error && depth < 10
      ? result + " Caused by: " + formatError(error.cause, depth + 1)
      : result
  }

  function formatValue(value: unknown): string {
    if (value instanceof Error) return formatError(value)

    if (typeof value === "object" && value !== null) {
      try {
        return JSON.stringify(value)
      } catch {
        return String(value)
      }
    }
    return String(value)
  }

  let last = Date.now()

  /**
   * Create a logger with optional tags.
   * Loggers with a `service` tag are cached and reused.
   */
  export function create(tags?: Record<string, unknown>): Logger {
    const service = tags?.["service"]
    if (typeof service === "string") {
      const cached = loggers.get(service)
      if (cached) {
        return cached
      }
    }

    const logger = make(tags ? { ...tags } : {})
    if (typeof service === "string") {
      loggers.set(service, logger)
    }
    return logger
  }

  function make(ownTags: Record<string, unknown>): Logger {
    function build(message?: string, extra?: Record<string, unknown>): string {
      const allTags = { ...ownTags, ...extra }
      const prefix = Object.entries(allTags)
        .filter(([_, value]) => value !== undefined && value !== null)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(" ")

      const now = new Date()
      const diff = now.getTime() - last
      last = now.getTime()

      const timestamp = now.toISOString().split(".")[0]
      return [timestamp, `+${diff}ms`, prefix, message].filter(Boolean).join(" ") + "\n"
    }

    const result: Logger = {
      debug(message?: string, extra?: Record<string, unknown>) {
        if (shouldLog("DEBUG")) {
          write("DEBUG " + build(message, extra))
        }
      },
      info(message?: string, extra?: Record<string, unknown>) {
        if (shouldLog("INFO")) {
          write("INFO  " + build(message, extra))
        }
      },
      warn(message?: string, extra?: Record<string, unknown>) {
        if (shouldLog("WARN")) {
          write("WARN  " + build(message, extra))
        }
      },
      error(message?: string, extra?: Record<string, unknown>) {
        if (shouldLog("ERROR")) {
          write("ERROR " + build(message, extra))
        }
      },
      tag(key: string, value: string) {
        ownTags[key] = value
        return result
      },
      clone() {
        return make({ ...ownTags })
      },
      time(message: string, extra?: Record<string, unknown>) {
        const start = Date.now()
        result.debug(message, { status: "started", ...extra })

        return {
          stop() {
            result.debug(message, {
              status: "completed",
              duration: `${Date.now() - start}ms`,
              ...extra,
            })
          },
        }
      },
    }

    return result
  }

  /**
   * Run a function with a temporary log level.
   * The previous level is restored when the function returns or throws.
   *
   * @example
   * ```ts
   * Log.withLevel("DEBUG", () => Locate.nodeAt(root, 42))
   * ```
   */
  export function withLevel<T>(level: Level, fn: () => T): T {
    const oldLevel = currentLevel
    setLevel(level)
    try {
      return fn()
    } finally {
      setLevel(oldLevel)
    }
  }
}

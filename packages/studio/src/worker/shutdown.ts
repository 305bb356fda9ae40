/**
 * Graceful shutdown for both processes.
 *
 * Shutdown sequence:
 * T+0s   SIGTERM received
 * T+0s   Stop accepting new HTTP requests (HTTP process only)
 * T+0s   Stop the background unit (graphile runner or publish worker)
 * T+45s  Deadline: proceed even if it hasn't stopped
 * then   Close database pool, exit
 */

import type { Logger } from "@reelsmith/shared/tracing"
import type { FastifyBaseLogger } from "fastify"

export interface Stoppable {
  stop(): Promise<void>
}

export interface ShutdownDeps {
  log: Logger
  /** Closes the HTTP server; absent in the publish worker process. */
  closeServer?: () => Promise<void>
  runner: Stoppable
  pool: { end(): Promise<void> }
  onDrainStart?: () => Promise<void>
  /** Defaults to process.exit. */
  exit?: (code: number) => void
  deadlineMs?: number
}

/** Maximum time to wait for in-flight work to drain before forcing shutdown */
const STOP_DEADLINE_MS = 45_000

/** Build the idempotent shutdown routine. */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let shuttingDown = false
  const exit = deps.exit ?? ((code: number) => process.exit(code))

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true

    deps.log.info("Shutdown signal received, draining…", { signal })

    if (deps.closeServer) {
      await deps.closeServer().catch((err: unknown) => {
        deps.log.error("Error closing HTTP server", { err: String(err) })
      })
    }

    if (deps.onDrainStart) {
      await deps.onDrainStart().catch((err: unknown) => {
        deps.log.error("Error during pre-drain hooks", { err: String(err) })
      })
    }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, deps.deadlineMs ?? STOP_DEADLINE_MS)
    })
    await Promise.race([deps.runner.stop(), deadline])
      .catch((err: unknown) => {
        deps.log.error("Error stopping background work", { err: String(err) })
      })
      .finally(() => clearTimeout(timer))

    await deps.pool.end().catch((err: unknown) => {
      deps.log.error("Error closing database pool", { err: String(err) })
    })

    deps.log.info("Shutdown complete")
    exit(0)
  }
}

/**
 * Register SIGTERM and SIGINT handlers that perform graceful shutdown.
 * Returns a cleanup function to remove the signal listeners.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  const shutdown = createShutdown(deps)

  const onSigterm = (): void => void shutdown("SIGTERM")
  const onSigint = (): void => void shutdown("SIGINT")

  process.on("SIGTERM", onSigterm)
  process.on("SIGINT", onSigint)

  // Catch unhandled errors so the process doesn't die silently
  const onUnhandledRejection = (err: unknown): void => {
    deps.log.error("Unhandled promise rejection, shutting down", { err: String(err) })
    void shutdown("unhandledRejection")
  }
  const onUncaughtException = (err: unknown): void => {
    deps.log.error("Uncaught exception, shutting down", { err: String(err) })
    void shutdown("uncaughtException")
  }

  process.on("unhandledRejection", onUnhandledRejection)
  process.on("uncaughtException", onUncaughtException)

  return () => {
    process.removeListener("SIGTERM", onSigterm)
    process.removeListener("SIGINT", onSigint)
    process.removeListener("unhandledRejection", onUnhandledRejection)
    process.removeListener("uncaughtException", onUncaughtException)
  }
}

/** View a Fastify/pino logger through the message-first Logger interface. */
export function fromPino(log: FastifyBaseLogger): Logger {
  return {
    debug: (message, extra) => log.debug(extra ?? {}, message),
    info: (message, extra) => log.info(extra ?? {}, message),
    warn: (message, extra) => log.warn(extra ?? {}, message),
    error: (message, extra) => log.error(extra ?? {}, message),
  }
}

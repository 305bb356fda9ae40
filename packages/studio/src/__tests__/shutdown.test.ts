import { afterEach, describe, expect, it, vi } from "vitest"

import { drainDeadlineMs } from "../publishing/worker.js"
import { createShutdown } from "../worker/shutdown.js"
import { RecordingLogger } from "./helpers/fakes.js"

describe("createShutdown", () => {
  it("closes the server, stops the runner, ends the pool, then exits", async () => {
    const order: string[] = []
    const log = new RecordingLogger()
    const exit = vi.fn((code: number) => {
      order.push(`exit:${code}`)
    })
    const shutdown = createShutdown({
      log,
      closeServer: async () => {
        order.push("server")
      },
      runner: {
        stop: async () => {
          order.push("runner")
        },
      },
      pool: {
        end: async () => {
          order.push("pool")
        },
      },
      exit,
    })

    await shutdown("SIGTERM")

    expect(order).toEqual(["server", "runner", "pool", "exit:0"])
    expect(log.entries[0]).toEqual({
      level: "info",
      message: "Shutdown signal received, draining…",
      extra: { signal: "SIGTERM" },
    })
    expect(log.messages("info").at(-1)).toBe("Shutdown complete")
  })

  it("runs once when signalled twice", async () => {
    const end = vi.fn(async () => {})
    const exit = vi.fn()
    const shutdown = createShutdown({
      log: new RecordingLogger(),
      runner: { stop: async () => {} },
      pool: { end },
      exit,
    })

    await shutdown("SIGTERM")
    await shutdown("SIGINT")

    expect(end).toHaveBeenCalledTimes(1)
    expect(exit).toHaveBeenCalledTimes(1)
  })

  it("gives up on a runner that outlives the deadline", async () => {
    const end = vi.fn(async () => {})
    const exit = vi.fn()
    const shutdown = createShutdown({
      log: new RecordingLogger(),
      runner: { stop: () => new Promise<void>(() => {}) },
      pool: { end },
      exit,
      deadlineMs: 10,
    })

    await shutdown("SIGTERM")

    expect(end).toHaveBeenCalledTimes(1)
    expect(exit).toHaveBeenCalledWith(0)
  })

  it("logs step failures and still exits", async () => {
    const log = new RecordingLogger()
    const exit = vi.fn()
    const shutdown = createShutdown({
      log,
      runner: {
        stop: async () => {
          throw new Error("stuck")
        },
      },
      pool: { end: async () => {} },
      exit,
    })

    await shutdown("SIGINT")

    expect(log.messages("error")).toEqual(["Error stopping background work"])
    expect(exit).toHaveBeenCalledWith(0)
  })

  describe("publish worker deadline", () => {
    afterEach(() => {
      vi.useRealTimers()
    })

    it("covers one visibility timeout plus a margin", () => {
      expect(drainDeadlineMs({ visibilityTimeoutSeconds: 300 })).toBe(305_000)
    })

    it("lets a slow in-flight publish finish before the pool closes", async () => {
      vi.useFakeTimers()
      const events: string[] = []
      const shutdown = createShutdown({
        log: new RecordingLogger(),
        runner: {
          stop: () =>
            new Promise<void>((resolve) => {
              setTimeout(() => {
                events.push("publish finished")
                resolve()
              }, 60_000)
            }),
        },
        pool: {
          end: async () => {
            events.push("pool closed")
          },
        },
        exit: () => {
          events.push("exit")
        },
        deadlineMs: drainDeadlineMs({ visibilityTimeoutSeconds: 300 }),
      })

      const done = shutdown("SIGTERM")
      await vi.advanceTimersByTimeAsync(60_000)
      await done

      expect(events).toEqual(["publish finished", "pool closed", "exit"])
    })
  })
})

/**
 * Supervisor Tests
 *
 * Uses two small units shaped like the gateway and the cache to check
 * delivery order, concurrency and the one-for-one restart policy.
 */

import { setTimeout as delay } from "node:timers/promises";
import { describe, it, expect } from "vitest";
import { Supervisor, type Factories } from "../../src/agents/supervisor.js";
import { NotFoundError, UnitUnavailableError } from "../../src/utils/errors.js";

type Empty = Record<string, never>;

type ToyCache = {
  slow_get: { msg: { ms: number }; reply: string };
};

type ToyGateway = {
  append: { msg: { value: string; ms: number }; reply: void };
  entries: { msg: Empty; reply: string[] };
  probe: { msg: { ms: number }; reply: number };
  fail_with: { msg: { error: unknown }; reply: void };
  lose_socket: { msg: Empty; reply: void };
};

type ToyProtocols = { cache: ToyCache; gateway: ToyGateway };

function toyTree(stops: string[] = []): { factories: Factories<ToyProtocols>; builds: () => number } {
  let gatewayBuilds = 0;
  const factories: Factories<ToyProtocols> = {
    cache: () => ({
      handlers: {
        slow_get: {
          mode: "concurrent",
          handle: async ({ ms }) => {
            await delay(ms);
            return "cached";
          },
        },
      },
      stop: () => {
        stops.push("cache");
      },
    }),
    gateway: () => {
      gatewayBuilds += 1;
      const entries: string[] = [];
      let inFlight = 0;
      let peak = 0;
      return {
        handlers: {
          append: {
            mode: "sequential",
            handle: async ({ value, ms }) => {
              await delay(ms);
              entries.push(value);
            },
          },
          entries: { mode: "sequential", handle: () => [...entries] },
          probe: {
            mode: "concurrent",
            handle: async ({ ms }) => {
              inFlight += 1;
              peak = Math.max(peak, inFlight);
              await delay(ms);
              inFlight -= 1;
              return peak;
            },
          },
          fail_with: {
            mode: "concurrent",
            handle: ({ error }) => {
              throw error;
            },
          },
          lose_socket: {
            mode: "concurrent",
            handle: (_msg, ctx) => {
              ctx.fail(new Error("socket closed"));
            },
          },
        },
        stop: () => {
          stops.push("gateway");
        },
      };
    },
  };
  return { factories, builds: () => gatewayBuilds };
}

describe("Supervisor", () => {
  it("should run sequential messages in arrival order", async () => {
    const sup = new Supervisor<ToyProtocols>(toyTree().factories);
    await sup.start();

    sup.tell("gateway", "append", { value: "a", ms: 20 });
    sup.tell("gateway", "append", { value: "b", ms: 0 });
    sup.tell("gateway", "append", { value: "c", ms: 5 });

    expect(await sup.ask("gateway", "entries", {})).toEqual(["a", "b", "c"]);
  });

  it("should overlap concurrent messages", async () => {
    const sup = new Supervisor<ToyProtocols>(toyTree().factories);
    await sup.start();

    const peaks = await Promise.all([
      sup.ask("gateway", "probe", { ms: 20 }),
      sup.ask("gateway", "probe", { ms: 20 }),
    ]);
    expect(Math.max(...peaks)).toBe(2);
  });

  it("should restart only the failing unit and leave a sibling's ask alone", async () => {
    const tree = toyTree();
    const sup = new Supervisor<ToyProtocols>(tree.factories);
    const restarted: string[] = [];
    sup.on("unit_restarted", (unit) => restarted.push(unit));
    await sup.start();

    sup.tell("gateway", "append", { value: "before", ms: 0 });
    const pending = sup.ask("cache", "slow_get", { ms: 30 });
    await expect(sup.ask("gateway", "fail_with", { error: new Error("boom") })).rejects.toThrow("boom");

    expect(await pending).toBe("cached");
    expect(restarted).toEqual(["gateway"]);
    expect(sup.restartsOf("gateway")).toBe(1);
    expect(sup.restartsOf("cache")).toBe(0);
    expect(tree.builds()).toBe(2);
    expect(await sup.ask("gateway", "entries", {})).toEqual([]);
  });

  it("should not restart on a non-critical error", async () => {
    const sup = new Supervisor<ToyProtocols>(toyTree().factories);
    await sup.start();

    await expect(sup.ask("gateway", "fail_with", { error: new NotFoundError("instrument 1") })).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(sup.restartsOf("gateway")).toBe(0);
  });

  it("should mark a unit failed once it exceeds its restart budget", async () => {
    const sup = new Supervisor<ToyProtocols>(toyTree().factories, { maxRestarts: 1 });
    const failed: string[] = [];
    sup.on("unit_failed", (unit) => failed.push(unit));
    await sup.start();

    await expect(sup.ask("gateway", "fail_with", { error: new Error("one") })).rejects.toThrow("one");
    await expect(sup.ask("gateway", "fail_with", { error: new Error("two") })).rejects.toThrow("two");

    expect(sup.isFailed("gateway")).toBe(true);
    expect(failed).toEqual(["gateway"]);
    await expect(sup.ask("gateway", "entries", {})).rejects.toBeInstanceOf(UnitUnavailableError);
    expect(await sup.ask("cache", "slow_get", { ms: 0 })).toBe("cached");
  });

  it("should restart a unit that reports a failure outside a handler", async () => {
    const tree = toyTree();
    const sup = new Supervisor<ToyProtocols>(tree.factories);
    await sup.start();

    await sup.ask("gateway", "lose_socket", {});
    expect(sup.restartsOf("gateway")).toBe(1);
    expect(tree.builds()).toBe(2);
  });

  it("should stop units in reverse order and refuse messages afterwards", async () => {
    const stops: string[] = [];
    const sup = new Supervisor<ToyProtocols>(toyTree(stops).factories);
    await sup.start();
    await sup.stop();

    expect(stops).toEqual(["gateway", "cache"]);
    await expect(sup.ask("cache", "slow_get", { ms: 0 })).rejects.toBeInstanceOf(UnitUnavailableError);
  });
});

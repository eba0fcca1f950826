/**
 * Prerequisite Resolver Tests
 */

import { describe, it, expect } from "vitest";
import {
  MAX_RESOLUTION_STEPS,
  ResolutionBudget,
  resolveAndIssue,
  type Prerequisite,
  type PrerequisiteHost,
} from "../../../src/api/broker/resolver.js";
import { AuthChainExhaustedError, UnauthorizedError } from "../../../src/utils/errors.js";

class FakeHost implements PrerequisiteHost {
  readonly present = new Set<Prerequisite>();
  readonly produced: Prerequisite[] = [];
  readonly reauths: Array<string | undefined> = [];
  /** Producers listed here run but leave their prerequisite unset */
  readonly broken = new Set<Prerequisite>();
  session: string | undefined;
  private logins = 0;

  has(prerequisite: Prerequisite): boolean {
    return this.present.has(prerequisite);
  }

  async produce(prerequisite: Prerequisite): Promise<void> {
    this.produced.push(prerequisite);
    if (this.broken.has(prerequisite)) return;
    if (prerequisite === "session") this.login();
    this.present.add(prerequisite);
  }

  currentSession(): string | undefined {
    return this.session;
  }

  async reauthenticate(rejected: string | undefined): Promise<void> {
    this.reauths.push(rejected);
    this.login();
  }

  private login(): void {
    this.logins += 1;
    this.session = `token-${this.logins}`;
    this.present.add("session");
  }
}

describe("resolveAndIssue", () => {
  it("should produce missing prerequisites in dependency order before issuing", async () => {
    const host = new FakeHost();
    const result = await resolveAndIssue(host, {
      operation: "fetchPositions",
      requires: ["account", "session", "endpoints"],
      issue: async () => "positions",
    });
    expect(result).toBe("positions");
    expect(host.produced).toEqual(["session", "endpoints", "account"]);
  });

  it("should issue straight away when everything is present", async () => {
    const host = new FakeHost();
    host.present.add("session");
    await resolveAndIssue(host, { operation: "op", requires: ["session"], issue: async () => 1 });
    expect(host.produced).toEqual([]);
  });

  it("should fail when a producer leaves its prerequisite unset", async () => {
    const host = new FakeHost();
    host.broken.add("session");
    const call = resolveAndIssue(host, { operation: "fetchOrders", requires: ["session"], issue: async () => 1 });
    await expect(call).rejects.toBeInstanceOf(AuthChainExhaustedError);
    await expect(call).rejects.toMatchObject({ prerequisite: "session", operation: "fetchOrders" });
    expect(host.produced).toEqual(["session"]);
  });

  it("should re-authenticate once after a 401 and retry with the new token", async () => {
    const host = new FakeHost();
    const seen: Array<string | undefined> = [];
    const result = await resolveAndIssue(host, {
      operation: "fetchOrders",
      requires: ["session"],
      issue: async () => {
        seen.push(host.session);
        if (seen.length === 1) throw new UnauthorizedError("fetchOrders");
        return "orders";
      },
    });
    expect(result).toBe("orders");
    expect(seen).toEqual(["token-1", "token-2"]);
    expect(host.reauths).toEqual(["token-1"]);
  });

  it("should give up on a second 401 within the same call", async () => {
    const host = new FakeHost();
    let attempts = 0;
    const call = resolveAndIssue(host, {
      operation: "fetchOrders",
      requires: ["session"],
      issue: async () => {
        attempts += 1;
        throw new UnauthorizedError("fetchOrders");
      },
    });
    await expect(call).rejects.toBeInstanceOf(UnauthorizedError);
    expect(attempts).toBe(2);
    expect(host.reauths).toHaveLength(1);
  });

  it("should not retry on errors other than 401", async () => {
    const host = new FakeHost();
    host.present.add("session");
    let attempts = 0;
    const call = resolveAndIssue(host, {
      operation: "op",
      requires: ["session"],
      issue: async () => {
        attempts += 1;
        throw new Error("boom");
      },
    });
    await expect(call).rejects.toThrow("boom");
    expect(attempts).toBe(1);
    expect(host.reauths).toEqual([]);
  });
});

describe("ResolutionBudget", () => {
  it("should allow a single re-authentication", () => {
    const budget = new ResolutionBudget();
    expect(budget.claimReauth("op")).toBe(true);
    expect(budget.claimReauth("op")).toBe(false);
    expect(budget.hasProduced("session")).toBe(true);
  });

  it("should stop after the step cap", () => {
    const budget = new ResolutionBudget();
    for (let i = 0; i < MAX_RESOLUTION_STEPS; i++) {
      budget.markProduced("account", "op");
    }
    expect(budget.stepCount).toBe(MAX_RESOLUTION_STEPS);
    expect(() => budget.markProduced("account", "op")).toThrow(AuthChainExhaustedError);
  });
});

/**
 * Cascading prerequisite resolution.
 *
 * A call declares which prerequisites it needs. Before issuing it, the
 * resolver checks them in a fixed order and runs the producer of the first
 * missing one, then checks again. A producer may run at most once per
 * top-level call and the session may be re-acquired at most once after a
 * 401; either bound being hit ends the call with a typed error.
 */

import { AuthChainExhaustedError, isUnauthorized } from "../../utils/errors.js";
import { agentLogger } from "../../utils/logger.js";

const log = agentLogger("resolver");

export type Prerequisite = "session" | "endpoints" | "userToken" | "account";

export const PREREQUISITE_ORDER: readonly Prerequisite[] = ["session", "endpoints", "userToken", "account"];

/** Hard cap on producer runs plus re-authentications within one budget */
export const MAX_RESOLUTION_STEPS = 8;

export interface CallSpec<T> {
  operation: string;
  requires: readonly Prerequisite[];
  issue(): Promise<T>;
}

/** What the resolver needs from the session owner */
export interface PrerequisiteHost {
  has(prerequisite: Prerequisite): boolean;
  produce(prerequisite: Prerequisite, budget: ResolutionBudget): Promise<void>;
  /** Token the next request will carry */
  currentSession(): string | undefined;
  /** Drop the rejected token and log in again (single-flight) */
  reauthenticate(rejected: string | undefined): Promise<void>;
}

/** Per top-level call; nested producer calls share it */
export class ResolutionBudget {
  private readonly produced = new Set<Prerequisite>();
  private reauthUsed = false;
  private steps = 0;

  hasProduced(prerequisite: Prerequisite): boolean {
    return this.produced.has(prerequisite);
  }

  markProduced(prerequisite: Prerequisite, operation: string): void {
    this.step(prerequisite, operation);
    this.produced.add(prerequisite);
  }

  /** Claims the single re-authentication; false when already spent */
  claimReauth(operation: string): boolean {
    if (this.reauthUsed) return false;
    this.step("session", operation);
    this.reauthUsed = true;
    this.produced.add("session");
    return true;
  }

  get stepCount(): number {
    return this.steps;
  }

  private step(prerequisite: Prerequisite, operation: string): void {
    this.steps += 1;
    if (this.steps > MAX_RESOLUTION_STEPS) {
      throw new AuthChainExhaustedError(prerequisite, operation);
    }
  }
}

export async function resolveAndIssue<T>(
  host: PrerequisiteHost,
  spec: CallSpec<T>,
  budget: ResolutionBudget = new ResolutionBudget()
): Promise<T> {
  const ordered = PREREQUISITE_ORDER.filter((p) => spec.requires.includes(p));

  for (;;) {
    const missing = ordered.find((p) => !host.has(p));
    if (missing !== undefined) {
      if (budget.hasProduced(missing)) {
        throw new AuthChainExhaustedError(missing, spec.operation);
      }
      log.debug("Resolving prerequisite", { operation: spec.operation, prerequisite: missing });
      budget.markProduced(missing, spec.operation);
      await host.produce(missing, budget);
      continue;
    }

    const used = host.currentSession();
    try {
      return await spec.issue();
    } catch (err) {
      if (!isUnauthorized(err) || !budget.claimReauth(spec.operation)) {
        throw err;
      }
      log.info("Session rejected, re-authenticating", { operation: spec.operation });
      await host.reauthenticate(used);
    }
  }
}

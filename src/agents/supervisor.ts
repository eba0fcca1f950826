/**
 * Supervisor for the unit tree.
 *
 * Each unit is a cell: the live instance, the factory that built it and a
 * restart counter. Messages are delivered through the event loop, never by a
 * direct call. A unit declares per message type whether its handler runs
 * sequentially (chained behind the previous sequential message) or
 * concurrently. When a handler fails critically only that unit is rebuilt;
 * its siblings and the handlers already running keep going.
 */

import { EventEmitter } from "eventemitter3";
import type winston from "winston";
import { agentLogger, describeError } from "../utils/logger.js";
import { isCritical, UnitUnavailableError } from "../utils/errors.js";
import { generateId } from "../utils/validation.js";

const log = agentLogger("supervisor");

// ── Protocol typing ─────────────────────────────────────────

/** Message type → payload and reply */
export type MessageMap = Record<string, { msg: unknown; reply: unknown }>;

/** Unit name → its message map */
export type ProtocolMap = Record<string, MessageMap>;

export type MsgOf<P, K> = P extends Record<string, unknown>
  ? P[K & keyof P] extends { msg: infer M } ? M : never
  : never;

export type ReplyOf<P, K> = P extends Record<string, unknown>
  ? P[K & keyof P] extends { reply: infer R } ? R : never
  : never;

export type ExecutionMode = "sequential" | "concurrent";

export interface Handler<M, R, C> {
  mode: ExecutionMode;
  handle(msg: M, ctx: C): Promise<R> | R;
}

export type Handlers<P extends MessageMap, C> = {
  [K in keyof P & string]: Handler<MsgOf<P, K>, ReplyOf<P, K>, C>;
};

/** What a running unit sees of the tree */
export interface UnitContext<Ps extends ProtocolMap> {
  readonly name: string;
  readonly log: winston.Logger;
  ask<U extends keyof Ps & string, K extends keyof Ps[U] & string>(
    unit: U,
    type: K,
    msg: MsgOf<Ps[U], K>
  ): Promise<ReplyOf<Ps[U], K>>;
  tell<U extends keyof Ps & string, K extends keyof Ps[U] & string>(unit: U, type: K, msg: MsgOf<Ps[U], K>): void;
  /** Report a failure that happened outside a handler (e.g. a socket error) */
  fail(err: unknown): void;
}

export interface Unit<P extends MessageMap, Ps extends ProtocolMap> {
  readonly handlers: Handlers<P, UnitContext<Ps>>;
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
}

export type UnitFactory<P extends MessageMap, Ps extends ProtocolMap> = (ctx: UnitContext<Ps>) => Unit<P, Ps>;

export type Factories<Ps extends ProtocolMap> = { [U in keyof Ps & string]: UnitFactory<Ps[U], Ps> };

// ── Events ──────────────────────────────────────────────────

export interface SupervisorEvents {
  unit_started: (unit: string) => void;
  unit_restarted: (unit: string, restarts: number, cause: unknown) => void;
  unit_failed: (unit: string, cause: unknown) => void;
  message_failed: (unit: string, type: string, error: unknown) => void;
}

export interface SupervisorOptions {
  /** Rebuilds allowed per unit before it is marked failed */
  maxRestarts?: number;
}

interface Cell<P extends MessageMap, Ps extends ProtocolMap> {
  readonly name: string;
  readonly factory: UnitFactory<P, Ps>;
  readonly context: UnitContext<Ps>;
  instance: Unit<P, Ps>;
  generation: number;
  restarts: number;
  failed: boolean;
  /** Completion of the last sequential message */
  tail: Promise<void>;
}

type Cells<Ps extends ProtocolMap> = { [U in keyof Ps & string]: Cell<Ps[U], Ps> };

const settle = (): void => undefined;

export class Supervisor<Ps extends ProtocolMap> extends EventEmitter<SupervisorEvents> {
  private readonly cells: Partial<Cells<Ps>> = {};
  private readonly order: Array<keyof Ps & string>;
  private readonly maxRestarts: number;
  private stopped = false;

  constructor(factories: Factories<Ps>, options: SupervisorOptions = {}) {
    super();
    this.maxRestarts = options.maxRestarts ?? 5;
    this.order = Object.keys(factories).filter((name): name is keyof Ps & string => name in factories);
    for (const name of this.order) {
      this.install(name, factories[name]);
    }
  }

  private install<U extends keyof Ps & string>(name: U, factory: UnitFactory<Ps[U], Ps>): void {
    const context = this.contextFor(name);
    const cell: Cell<Ps[U], Ps> = {
      name,
      factory,
      context,
      instance: factory(context),
      generation: 0,
      restarts: 0,
      failed: false,
      tail: Promise.resolve(),
    };
    this.cells[name] = cell;
  }

  private cell<U extends keyof Ps & string>(name: U): Cell<Ps[U], Ps> {
    const cell = this.cells[name];
    if (!cell) throw new UnitUnavailableError(name);
    return cell;
  }

  private contextFor<U extends keyof Ps & string>(name: U): UnitContext<Ps> {
    return {
      name,
      log: agentLogger(name),
      ask: (unit, type, msg) => this.ask(unit, type, msg),
      tell: (unit, type, msg) => this.tell(unit, type, msg),
      fail: (err) => {
        const cell = this.cell(name);
        this.restart(cell, cell.generation, err);
      },
    };
  }

  // ── Lifecycle ────────────────────────────────────────────

  /** Start every unit in declaration order */
  async start(): Promise<void> {
    for (const name of this.order) {
      const cell = this.cell(name);
      await this.startInstance(cell, cell.generation);
      log.info(`Unit started: ${name}`);
      this.emit("unit_started", name);
    }
  }

  /** Stop every unit in reverse order */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const name of [...this.order].reverse()) {
      const cell = this.cell(name);
      try {
        await cell.instance.stop?.();
      } catch (err) {
        log.warn(`Unit ${name} failed to stop cleanly`, { error: describeError(err) });
      }
    }
  }

  restartsOf(unit: keyof Ps & string): number {
    return this.cell(unit).restarts;
  }

  isFailed(unit: keyof Ps & string): boolean {
    return this.cell(unit).failed;
  }

  // ── Messaging ────────────────────────────────────────────

  ask<U extends keyof Ps & string, K extends keyof Ps[U] & string>(
    unit: U,
    type: K,
    msg: MsgOf<Ps[U], K>
  ): Promise<ReplyOf<Ps[U], K>> {
    const id = generateId();

    return new Promise<ReplyOf<Ps[U], K>>((resolve, reject) => {
      setImmediate(() => {
        const cell = this.cells[unit];
        if (!cell || cell.failed || this.stopped) {
          reject(new UnitUnavailableError(unit));
          return;
        }
        const handlers: Handlers<Ps[U], UnitContext<Ps>> = cell.instance.handlers;
        const mode = handlers[type].mode;
        const generation = cell.generation;
        log.debug("Delivering message", { unit, type, id, mode });

        // The instance is read at run time so queued work lands on a rebuilt unit
        const run = async (): Promise<ReplyOf<Ps[U], K>> => {
          if (cell.failed) throw new UnitUnavailableError(unit);
          const current: Handlers<Ps[U], UnitContext<Ps>> = cell.instance.handlers;
          return current[type].handle(msg, cell.context);
        };

        let result: Promise<ReplyOf<Ps[U], K>>;
        if (mode === "sequential") {
          result = cell.tail.then(run);
          cell.tail = result.then(settle, settle);
        } else {
          result = run();
        }

        result.then(resolve, (err: unknown) => {
          if (isCritical(err)) {
            this.restart(cell, generation, err);
          }
          reject(err);
        });
      });
    });
  }

  /** Fire-and-forget; failures are logged and emitted */
  tell<U extends keyof Ps & string, K extends keyof Ps[U] & string>(unit: U, type: K, msg: MsgOf<Ps[U], K>): void {
    this.ask(unit, type, msg).catch((err: unknown) => {
      log.error(`Message ${unit}.${type} failed`, { error: describeError(err) });
      this.emit("message_failed", unit, type, err);
    });
  }

  // ── Restart policy ───────────────────────────────────────

  private restart<P extends MessageMap>(cell: Cell<P, Ps>, generation: number, cause: unknown): void {
    // A later failure of an instance that was already replaced is ignored
    if (cell.failed || this.stopped || cell.generation !== generation) return;

    const old = cell.instance;
    cell.generation += 1;
    cell.restarts += 1;
    Promise.resolve()
      .then(() => old.stop?.())
      .catch((err: unknown) => {
        log.warn(`Unit ${cell.name} failed to stop during restart`, { error: describeError(err) });
      });

    if (cell.restarts > this.maxRestarts) {
      cell.failed = true;
      log.error(`Unit ${cell.name} exceeded ${this.maxRestarts} restarts, marking failed`, {
        error: describeError(cause),
      });
      this.emit("unit_failed", cell.name, cause);
      return;
    }

    log.warn(`Restarting unit ${cell.name}`, { restarts: cell.restarts, error: describeError(cause) });
    try {
      cell.instance = cell.factory(cell.context);
    } catch (err) {
      cell.failed = true;
      log.error(`Unit ${cell.name} could not be rebuilt`, { error: describeError(err) });
      this.emit("unit_failed", cell.name, err);
      return;
    }
    this.emit("unit_restarted", cell.name, cell.restarts, cause);
    this.startInstance(cell, cell.generation).catch((err: unknown) => {
      this.restart(cell, cell.generation, err);
    });
  }

  private async startInstance<P extends MessageMap>(cell: Cell<P, Ps>, generation: number): Promise<void> {
    if (cell.generation !== generation) return;
    await cell.instance.start?.();
  }
}

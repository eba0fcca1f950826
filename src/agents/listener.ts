/**
 * Listener unit: owns the TCP server. A socket-level failure is reported to
 * the supervisor, which rebuilds the unit and binds again.
 */

import { RpcServer } from "../rpc/server.js";
import { dispatchSafely } from "../rpc/dispatch.js";
import type { Handlers, Unit, UnitContext } from "./supervisor.js";
import type { ListenerProtocol, Protocols } from "../types/units.js";

export interface ListenerOptions {
  host: string;
  port: number;
  /** Called with the bound port once listening */
  onListening?: (port: number) => void;
}

export class ListenerUnit implements Unit<ListenerProtocol, Protocols> {
  readonly handlers: Handlers<ListenerProtocol, UnitContext<Protocols>> = {};
  private readonly server: RpcServer;

  constructor(ctx: UnitContext<Protocols>, private readonly options: ListenerOptions) {
    this.server = new RpcServer((req) => dispatchSafely(ctx, req));
    this.server.on("error", (err) => ctx.fail(err));
  }

  async start(): Promise<void> {
    const port = await this.server.listen(this.options.port, this.options.host);
    this.options.onListening?.(port);
  }

  stop(): Promise<void> {
    return this.server.close();
  }
}

/**
 * TCP listener for the RPC protocol.
 *
 * Per connection, the reader side decodes frames and dispatches each request
 * without waiting for earlier ones; the writer side emits responses in
 * request order from a queue of pending replies.
 */

import net from "node:net";
import { EventEmitter } from "eventemitter3";
import { agentLogger, describeError } from "../utils/logger.js";
import { FrameDecoder, writeFrame } from "./frame.js";
import { decodeRequest, encodeResponse, type Request, type Response } from "./messages.js";

const log = agentLogger("rpc-server");

export type RequestHandler = (req: Request) => Promise<Response | null>;

interface RpcServerEvents {
  error: (err: Error) => void;
}

export class RpcServer extends EventEmitter<RpcServerEvents> {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(private readonly handler: RequestHandler) {
    super();
    this.server = net.createServer((socket) => this.accept(socket));
    this.server.on("error", (err) => this.emit("error", err));
  }

  /** Resolves with the bound port (useful when listening on port 0) */
  listen(port: number, host: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        const address = this.server.address();
        const bound = typeof address === "object" && address ? address.port : port;
        log.info(`RPC listening on ${host}:${bound}`);
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    const decoder = new FrameDecoder();
    let writer: Promise<void> = Promise.resolve();

    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", (err) => log.warn("Connection error", { error: err.message }));
    decoder.on("error", (err) => {
      log.warn("Dropping connection on bad frame", { error: err.message });
      socket.destroy();
    });

    decoder.on("data", (payload: Buffer) => {
      let pending: Promise<Response | null>;
      try {
        const req = decodeRequest(payload);
        log.debug("Request received", { type: req.type });
        pending = this.handler(req);
      } catch (err) {
        log.warn("Undecodable request", { error: describeError(err) });
        pending = Promise.resolve(null);
      }

      // Replies leave in request order even when handlers finish out of order
      writer = writer.then(async () => {
        const res = await pending.catch((err: unknown) => {
          log.error("Request handler failed", { error: describeError(err) });
          return null;
        });
        if (!socket.writable) return;
        await writeFrame(socket, encodeResponse(res));
      }).catch((err: unknown) => {
        log.error("Failed to write response", { error: describeError(err) });
        socket.destroy();
      });
    });

    socket.pipe(decoder);
  }
}

/**
 * One-shot RPC client: connect, send one request, await one response.
 * Timeout, disconnect or an undecodable reply all mean "no response";
 * there is no automatic retry.
 */

import net from "node:net";
import { agentLogger, describeError } from "../utils/logger.js";
import { encodeFrame, FrameDecoder } from "./frame.js";
import { decodeResponse, encodeRequest, type Request, type Response } from "./messages.js";

const log = agentLogger("rpc-client");

export interface RpcClientOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

export function sendRequest(req: Request, options: RpcClientOptions): Promise<Response | null> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve) => {
    let settled = false;
    const socket = net.connect({ host: options.host, port: options.port });
    const decoder = new FrameDecoder();

    const finish = (res: Response | null, reason?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (reason) log.warn(`No response: ${reason}`, { request: req.type });
      socket.destroy();
      resolve(res);
    };

    const timer = setTimeout(() => finish(null, `timed out after ${timeoutMs} ms`), timeoutMs);

    socket.on("connect", () => socket.write(encodeFrame(encodeRequest(req))));
    socket.on("error", (err) => finish(null, err.message));
    socket.on("close", () => finish(null, "connection closed"));
    decoder.on("error", (err) => finish(null, err.message));
    decoder.on("data", (payload: Buffer) => {
      try {
        finish(decodeResponse(payload));
      } catch (err) {
        finish(null, describeError(err));
      }
    });

    socket.pipe(decoder);
  });
}

/**
 * Push sink: sends each record as one UDP datagram to a local metrics
 * relay (FFWD-compatible JSON payloads).
 *
 * Delivery is best effort: no acknowledgement, no retry. A failed send is
 * logged and the record dropped; `deliver` never rejects.
 */

import { createSocket, type Socket } from "node:dgram";
import type { Logger } from "pino";
import type { MetricRecord } from "@pg-metrics/shared";
import { serializeRecord } from "../formatters/record.js";
import type { MetricSink } from "./types.js";

export const DEFAULT_PUSH_HOST = "127.0.0.1";
export const DEFAULT_PUSH_PORT = 19000;

/** Connectionless transport; injectable so tests need no network */
export interface DatagramTransport {
  send(payload: Buffer, port: number, host: string): Promise<void>;
  close(): Promise<void>;
}

/** UDP transport over node:dgram; the socket is opened on first send */
export function createUdpTransport(logger: Logger): DatagramTransport {
  let socket: Socket | null = null;

  const open = (): Socket => {
    if (socket) return socket;
    const created = createSocket("udp4");
    created.on("error", (err) => logger.warn({ err }, "udp socket error"));
    created.unref();
    socket = created;
    return created;
  };

  return {
    send(payload, port, host) {
      const s = open();
      return new Promise<void>((resolve, reject) => {
        s.send(payload, port, host, (err) => (err ? reject(err) : resolve()));
      });
    },
    close() {
      const s = socket;
      socket = null;
      if (!s) return Promise.resolve();
      return new Promise<void>((resolve) => s.close(() => resolve()));
    },
  };
}

export interface PushSinkOptions {
  host?: string;
  port?: number;
  transport?: DatagramTransport;
}

export class PushSink implements MetricSink {
  readonly name = "push";
  readonly host: string;
  readonly port: number;
  private transport: DatagramTransport;

  constructor(
    private logger: Logger,
    options?: PushSinkOptions,
  ) {
    this.host = options?.host ?? DEFAULT_PUSH_HOST;
    this.port = options?.port ?? DEFAULT_PUSH_PORT;
    this.transport = options?.transport ?? createUdpTransport(logger);
  }

  async deliver(records: readonly MetricRecord[]): Promise<void> {
    if (records.length === 0) return;
    const endpoint = `${this.host}:${this.port}`;
    let dropped = 0;
    let lastError: unknown = null;

    for (const record of records) {
      try {
        const payload = Buffer.from(serializeRecord(record), "utf8");
        await this.transport.send(payload, this.port, this.host);
      } catch (err) {
        dropped++;
        lastError = err;
      }
    }

    if (dropped > 0) {
      this.logger.warn(
        { endpoint, dropped, total: records.length, err: lastError },
        "dropped metrics that could not be pushed",
      );
    } else {
      this.logger.info({ endpoint, count: records.length }, "pushed metrics");
    }
  }

  async close(): Promise<void> {
    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn({ err }, "closing push transport failed");
    }
  }
}

/**
 * Console sink: one canonical JSON line per record on stdout.
 *
 * Write errors reject `deliver` with DeliveryFailure and stop the agent.
 */

import type { Writable } from "node:stream";
import type { MetricRecord } from "@pg-metrics/shared";
import { DeliveryFailure, errorMessage } from "../errors.js";
import { serializeRecord } from "../formatters/record.js";
import type { MetricSink } from "./types.js";

export class ConsoleSink implements MetricSink {
  readonly name = "console";
  private streamError: Error | null = null;

  // Stays attached: a failed write emits 'error' after its callback has run
  private readonly onError = (err: Error) => {
    this.streamError = err;
  };

  constructor(private stream: Writable = process.stdout) {
    stream.on("error", this.onError);
  }

  async deliver(records: readonly MetricRecord[]): Promise<void> {
    if (records.length === 0) return;
    const stream = this.stream;
    if (this.streamError) {
      throw new DeliveryFailure(`console output failed: ${this.streamError.message}`, { cause: this.streamError });
    }
    if (stream.destroyed || stream.writableEnded) {
      throw new DeliveryFailure("console output is closed");
    }

    const text = records.map((r) => `${serializeRecord(r)}\n`).join("");
    await new Promise<void>((resolve, reject) => {
      stream.write(text, (err) => {
        if (err) {
          reject(new DeliveryFailure(`writing metrics to console failed: ${errorMessage(err)}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    // stdout belongs to the process
  }
}

/**
 * Response recorders
 * Append-only sinks for exchange responses and their round-trip latencies
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ResponseRecord } from '../models/ResponseRecord';

export interface ResponseRecorder {
  record(record: ResponseRecord): Promise<void>;
}

export class InMemoryResponseRecorder implements ResponseRecorder {
  private records: ResponseRecord[] = [];

  async record(record: ResponseRecord): Promise<void> {
    this.records.push({ ...record });
  }

  getRecords(): ResponseRecord[] {
    return [...this.records];
  }

  recordsFor(orderId: number): ResponseRecord[] {
    return this.records.filter(record => record.orderId === orderId);
  }
}

/**
 * One line per response:
 * `2026-01-05T09:30:00.000Z | OrderID: 1000 | Response: Accept | Latency(ms): 50.00`
 */
export function formatResponseLine(record: ResponseRecord): string {
  const verdict = record.verdict === 'accept' ? 'Accept' : 'Reject';
  return `${record.timestamp.toISOString()} | OrderID: ${record.orderId} | Response: ${verdict} | Latency(ms): ${record.latencyMs.toFixed(2)}`;
}

export class FileResponseRecorder implements ResponseRecorder {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * Appends are chained so concurrent records land as whole lines in call order
   */
  record(record: ResponseRecord): Promise<void> {
    const line = `${formatResponseLine(record)}\n`;
    const write = this.writeChain.then(() => fs.appendFile(this.filePath, line, 'utf8'));
    // A failed append must not poison later ones; the caller still sees this failure
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  getFilePath(): string {
    return this.filePath;
  }
}

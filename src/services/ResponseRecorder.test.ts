/**
 * Tests for the response recorders
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileResponseRecorder, formatResponseLine, InMemoryResponseRecorder } from './ResponseRecorder';
import type { ResponseRecord } from '../models/ResponseRecord';

const ACCEPTED: ResponseRecord = {
  orderId: 1000,
  verdict: 'accept',
  latencyMs: 50,
  timestamp: new Date('2026-01-05T04:00:00.000Z')
};

const REJECTED: ResponseRecord = {
  orderId: 1001,
  verdict: 'reject',
  latencyMs: 7.5,
  timestamp: new Date('2026-01-05T04:00:01.250Z')
};

describe('formatResponseLine', () => {
  it('should write one pipe-separated line per response', () => {
    expect(formatResponseLine(ACCEPTED)).toBe(
      '2026-01-05T04:00:00.000Z | OrderID: 1000 | Response: Accept | Latency(ms): 50.00'
    );
    expect(formatResponseLine(REJECTED)).toBe(
      '2026-01-05T04:00:01.250Z | OrderID: 1001 | Response: Reject | Latency(ms): 7.50'
    );
  });
});

describe('InMemoryResponseRecorder', () => {
  it('should keep records in arrival order and filter them by order', async () => {
    const recorder = new InMemoryResponseRecorder();

    await recorder.record(ACCEPTED);
    await recorder.record(REJECTED);

    expect(recorder.getRecords().map(record => record.orderId)).toEqual([1000, 1001]);
    expect(recorder.recordsFor(1001)).toEqual([REJECTED]);
    expect(recorder.recordsFor(9999)).toEqual([]);
  });
});

describe('FileResponseRecorder', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'order-gateway-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should append whole lines in call order', async () => {
    const filePath = path.join(directory, 'responses.log');
    const recorder = new FileResponseRecorder(filePath);

    await Promise.all([recorder.record(ACCEPTED), recorder.record(REJECTED)]);

    const contents = await fs.readFile(filePath, 'utf8');
    expect(contents).toBe(
      '2026-01-05T04:00:00.000Z | OrderID: 1000 | Response: Accept | Latency(ms): 50.00\n' +
      '2026-01-05T04:00:01.250Z | OrderID: 1001 | Response: Reject | Latency(ms): 7.50\n'
    );
  });

  it('should keep existing lines when reopened', async () => {
    const filePath = path.join(directory, 'responses.log');

    await new FileResponseRecorder(filePath).record(ACCEPTED);
    await new FileResponseRecorder(filePath).record(REJECTED);

    const lines = (await fs.readFile(filePath, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
  });

  it('should report a failed append and still write later records', async () => {
    const missingDirectory = path.join(directory, 'missing');
    const recorder = new FileResponseRecorder(path.join(missingDirectory, 'responses.log'));

    await expect(recorder.record(ACCEPTED)).rejects.toMatchObject({ code: 'ENOENT' });

    await fs.mkdir(missingDirectory);
    await recorder.record(REJECTED);

    const contents = await fs.readFile(recorder.getFilePath(), 'utf8');
    expect(contents).toBe('2026-01-05T04:00:01.250Z | OrderID: 1001 | Response: Reject | Latency(ms): 7.50\n');
  });
});

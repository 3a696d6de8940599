import { describe, expect, it } from 'vitest';
import {
  SerialReadingSource,
  parseSerialLine,
} from '../../../../src/infra/sources/SerialReadingSource.js';
import type { LineConnection } from '../../../../src/infra/sources/SerialReadingSource.js';
import type { RawSample } from '../../../../src/domain/entities/RawSample.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

async function* linesOf(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

class FakeConnection implements LineConnection {
  closeCalls = 0;
  lines: AsyncIterable<string>;

  constructor(lines: string[]) {
    this.lines = linesOf(lines);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

function sourceFor(connections: Array<FakeConnection | Error>, initialDelayMs = 1) {
  let attempts = 0;
  const source = new SerialReadingSource(
    async () => {
      const next = connections[Math.min(attempts, connections.length - 1)];
      attempts += 1;
      if (next instanceof Error) throw next;
      return next;
    },
    {
      portPath: '/dev/ttyUSB0',
      patientId: 'p1',
      unit: 'raw',
      backoff: { initialDelayMs, maxDelayMs: initialDelayMs * 2 },
      now: () => NOW,
    }
  );
  return { source, attempts: () => attempts };
}

describe('parseSerialLine', () => {
  it('extracts the reading from well-formed lines', () => {
    expect(parseSerialLine('SOUND:123')).toBe(123);
    expect(parseSerialLine('SOUND:0\r')).toBe(0);
    expect(parseSerialLine('  SOUND:1023  ')).toBe(1023);
  });

  it('rejects anything else', () => {
    expect(parseSerialLine('SOUND:')).toBeNull();
    expect(parseSerialLine('SOUND:-5')).toBeNull();
    expect(parseSerialLine('sound:12')).toBeNull();
    expect(parseSerialLine('TEMP:36')).toBeNull();
    expect(parseSerialLine('')).toBeNull();
  });
});

describe('SerialReadingSource', () => {
  it('names itself after the port and defaults the device id', async () => {
    const connection = new FakeConnection(['SOUND:12']);
    const { source } = sourceFor([connection]);
    const controller = new AbortController();

    let first: RawSample | null = null;
    for await (const sample of source.samples(controller.signal)) {
      first = sample;
      controller.abort();
      break;
    }

    expect(source.name).toBe('serial:/dev/ttyUSB0');
    expect(first).toEqual({
      patientId: 'p1',
      deviceId: 'arduino-/dev/ttyUSB0',
      code: 'sound',
      value: 12,
      unit: 'raw',
      observedAt: NOW,
    });
  });

  it('skips malformed lines and reconnects after open failures and stream ends', async () => {
    const second = new FakeConnection(['SOUND:12', 'garbage', '', 'SOUND:40']);
    const third = new FakeConnection(['SOUND:7']);
    const { source, attempts } = sourceFor([new Error('port busy'), second, third]);
    const controller = new AbortController();

    const values: number[] = [];
    for await (const sample of source.samples(controller.signal)) {
      values.push(sample.value);
      if (values.length === 3) {
        controller.abort();
        break;
      }
    }

    expect(values).toEqual([12, 40, 7]);
    expect(attempts()).toBe(3);
    expect(second.closeCalls).toBe(1);
    expect(third.closeCalls).toBeGreaterThanOrEqual(1);
  });

  it('stops waiting for a reconnect when aborted', async () => {
    const { source, attempts } = sourceFor([new Error('no such port')], 60_000);
    const controller = new AbortController();
    const iterator = source.samples(controller.signal)[Symbol.asyncIterator]();

    const pending = iterator.next();
    setTimeout(() => controller.abort(), 10);

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(attempts()).toBe(1);
  });
});

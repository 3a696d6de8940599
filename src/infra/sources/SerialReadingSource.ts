import { setTimeout as sleep } from 'node:timers/promises';
import { SerialPort, ReadlineParser } from 'serialport';
import type { RawSample } from '../../domain/entities/RawSample.js';
import { TransportError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { initialBackoff, nextBackoff } from './backoff.js';
import type { BackoffPolicy } from './backoff.js';
import type { ReadingSource } from './ReadingSource.js';

/**
 * One open line-oriented connection to a device.
 * `close` must be safe to call more than once.
 */
export interface LineConnection {
  lines: AsyncIterable<string>;
  close(): Promise<void>;
}

export type LineConnector = () => Promise<LineConnection>;

export interface SerialSourceOptions {
  portPath: string;
  patientId: string;
  deviceId?: string;
  unit: string;
  backoff: BackoffPolicy;
  now?: () => Date;
}

// Device firmware prints one reading per line, e.g. "SOUND:123"
const SERIAL_LINE_PATTERN = /^SOUND:(\d+)\s*$/;

/**
 * Extract the reading from one serial line, or null when the line is malformed
 */
export function parseSerialLine(line: string): number | null {
  const match = SERIAL_LINE_PATTERN.exec(line.trim());
  return match ? Number(match[1]) : null;
}

/**
 * Reads sound-level lines from a serial device.
 * Reconnects forever with capped exponential backoff; malformed lines are skipped.
 */
export class SerialReadingSource implements ReadingSource {
  readonly name: string;
  private readonly deviceId: string;
  private readonly now: () => Date;

  constructor(
    private connect: LineConnector,
    private options: SerialSourceOptions
  ) {
    this.name = `serial:${options.portPath}`;
    this.deviceId = options.deviceId ?? `arduino-${options.portPath}`;
    this.now = options.now ?? (() => new Date());
  }

  async *samples(signal: AbortSignal): AsyncGenerator<RawSample> {
    let backoff = initialBackoff(this.options.backoff);

    while (!signal.aborted) {
      const connection = await this.open();

      if (connection) {
        backoff = initialBackoff(this.options.backoff);
        const onAbort = () => {
          connection.close().catch((error: unknown) => {
            logger.warn('Failed to close serial connection on abort', { source: this.name, error });
          });
        };
        signal.addEventListener('abort', onAbort, { once: true });

        let fault: TransportError | null;
        try {
          fault = yield* this.readSamples(connection, signal);
        } finally {
          signal.removeEventListener('abort', onAbort);
          await this.close(connection);
        }

        if (signal.aborted) return;
        if (fault) {
          logger.warn('Serial transport fault', {
            source: this.name,
            error: fault.message,
            cause: fault.cause,
          });
        }
      }

      logger.info('Reconnecting serial source', {
        source: this.name,
        attempt: backoff.attempt + 1,
        delayMs: backoff.nextDelayMs,
      });
      await waitFor(backoff.nextDelayMs, signal);
      backoff = nextBackoff(backoff, this.options.backoff);
    }
  }

  private async open(): Promise<LineConnection | null> {
    try {
      const connection = await this.connect();
      logger.info('Serial source connected', { source: this.name });
      return connection;
    } catch (error) {
      const fault =
        error instanceof TransportError
          ? error
          : new TransportError(`Failed to open ${this.name}`, { cause: error });
      logger.warn('Serial source unavailable', { source: this.name, error: fault.message });
      return null;
    }
  }

  private async close(connection: LineConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      logger.warn('Failed to close serial connection', { source: this.name, error });
    }
  }

  /**
   * Yields samples until the stream ends or fails; returns the fault, or null on abort
   */
  private async *readSamples(
    connection: LineConnection,
    signal: AbortSignal
  ): AsyncGenerator<RawSample, TransportError | null> {
    try {
      for await (const line of connection.lines) {
        if (signal.aborted) return null;

        const value = parseSerialLine(line);
        if (value === null) {
          if (line.trim().length > 0) {
            logger.warn('Skipping malformed serial line', { source: this.name, line: line.trim() });
          }
          continue;
        }

        yield {
          patientId: this.options.patientId,
          deviceId: this.deviceId,
          code: 'sound',
          value,
          unit: this.options.unit,
          observedAt: this.now(),
        };
      }
    } catch (error) {
      if (signal.aborted) return null;
      return new TransportError(`Read from ${this.name} failed`, { cause: error });
    }

    return signal.aborted ? null : new TransportError(`${this.name} stream ended`);
  }
}

async function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

/**
 * LineConnector backed by the serialport package.
 */
export function createSerialConnector(options: { path: string; baudRate: number }): LineConnector {
  return () =>
    new Promise<LineConnection>((resolve, reject) => {
      const port = new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });

      port.open((error) => {
        if (error) {
          reject(new TransportError(`Failed to open serial port ${options.path}`, { cause: error }));
          return;
        }

        const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
        port.on('error', (portError: Error) => parser.destroy(portError));
        port.on('close', () => parser.end());

        resolve({
          lines: readParserLines(parser),
          close: () => closePort(port),
        });
      });
    });
}

async function* readParserLines(parser: ReadlineParser): AsyncGenerator<string> {
  for await (const chunk of parser) {
    const data: unknown = chunk;
    if (typeof data === 'string') {
      yield data;
    } else if (Buffer.isBuffer(data)) {
      yield data.toString('utf8');
    }
  }
}

function closePort(port: SerialPort): Promise<void> {
  if (!port.isOpen) return Promise.resolve();
  return new Promise((resolve, reject) => {
    port.close((error) => (error ? reject(error) : resolve()));
  });
}

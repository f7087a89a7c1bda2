import { Metric } from './repository';

export type ByteRange = { offset: number; length: number };

/**
 * Random-access byte source an archive is read from.
 * Reads are positional, so concurrent callers never share a cursor.
 */
export interface IStorageRepository {
  /** Rejects when fewer than `length` bytes are available at `offset`. */
  getRange(range: ByteRange): Promise<Uint8Array>;
  /** Total size in bytes, when the source knows it. */
  getSize(): Promise<number | undefined>;
  getKey(): string;
  /** Safe to call more than once. */
  close(): Promise<void>;
}

export type AsyncFn<A extends unknown[] = unknown[], R = unknown> = (...args: A) => Promise<R>;
export type ErrorClass = new (...args: never[]) => Error;
export type Operation = { name: string; tags?: { [key: string]: string } };
export type Options = { monitorInvocations?: boolean; acceptedErrors?: ErrorClass[] };

export interface IMetricsRepository {
  monitorAsyncFunction<A extends unknown[], R>(
    operation: Operation,
    call: AsyncFn<A, R>,
    options?: Options,
  ): AsyncFn<A, R>;
  push(metric: Metric): void;
}

export interface IMetricsProviderRepository {
  pushMetric(metric: Metric): void;
  flush(): Promise<void>;
}

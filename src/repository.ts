import { GetObjectCommand, HeadObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Point } from '@influxdata/influxdb-client';
import { FileHandle, open } from 'node:fs/promises';
import {
  AsyncFn,
  ByteRange,
  IMetricsProviderRepository,
  IMetricsRepository,
  IStorageRepository,
  Operation,
  Options,
} from './interface';
import { monitorAsyncFunction } from './monitor';

export function toRangeHeader(range: ByteRange): string {
  return `bytes=${range.offset}-${range.offset + range.length - 1}`;
}

function assertRange(range: ByteRange) {
  if (!Number.isSafeInteger(range.offset) || range.offset < 0 || !Number.isSafeInteger(range.length) || range.length < 0) {
    throw new RangeError('Invalid byte range ' + JSON.stringify(range));
  }
}

export class FileStorageRepository implements IStorageRepository {
  private handle: Promise<FileHandle> | undefined;
  private closed = false;

  constructor(private path: string) {}

  private async getHandle(): Promise<FileHandle> {
    if (this.closed) {
      throw new Error(`Archive ${this.path} is closed`);
    }
    // a failed open is not cached, the next read tries again
    this.handle ??= open(this.path, 'r').catch((error: unknown) => {
      this.handle = undefined;
      throw error;
    });
    return this.handle;
  }

  async getRange(range: ByteRange): Promise<Uint8Array> {
    assertRange(range);
    const { offset, length } = range;
    const handle = await this.getHandle();
    const buffer = new Uint8Array(length);
    let read = 0;
    while (read < length) {
      const { bytesRead } = await handle.read(buffer, read, length - read, offset + read);
      if (bytesRead === 0) {
        break;
      }
      read += bytesRead;
    }
    if (read !== length) {
      throw new Error(`Short read from ${this.path}: wanted ${length} bytes at offset ${offset}, got ${read}`);
    }
    return buffer;
  }

  async getSize(): Promise<number> {
    const handle = await this.getHandle();
    const stat = await handle.stat();
    return stat.size;
  }

  getKey(): string {
    return this.path;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const pending = this.handle;
    this.handle = undefined;
    if (!pending) {
      return;
    }
    // nothing to release when the open itself failed
    const handle = await pending.then(
      (opened) => opened,
      () => undefined,
    );
    await handle?.close();
  }
}

export class S3StorageRepository implements IStorageRepository {
  constructor(
    private client: S3Client,
    private bucketKey: string,
    private fileName: string,
  ) {}

  async getRange(range: ByteRange): Promise<Uint8Array> {
    assertRange(range);
    if (range.length === 0) {
      return new Uint8Array(0);
    }
    const command = new GetObjectCommand({
      Bucket: this.bucketKey,
      Key: this.fileName,
      Range: toRangeHeader(range),
    });
    const response = await this.client.send(command);
    const data = response.Body;
    if (!data) {
      throw new Error('Data not found for range ' + JSON.stringify(range));
    }
    const bytes = await data.transformToByteArray();
    if (bytes.length !== range.length) {
      throw new Error(`Short read from ${this.getKey()}: wanted ${range.length} bytes, got ${bytes.length}`);
    }
    return bytes;
  }

  async getSize(): Promise<number | undefined> {
    const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucketKey, Key: this.fileName }));
    return response.ContentLength;
  }

  getKey(): string {
    return `${this.bucketKey}/${this.fileName}`;
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}

export class ConsoleMetricsProvider implements IMetricsProviderRepository {
  private _metrics: string[] = [];

  pushMetric(metric: Metric) {
    for (const [label, { value, type }] of metric.fields) {
      if (type === 'duration') {
        const suffix = label === 'duration' ? '' : `_${label.replace('_duration', '')}`;
        this._metrics.push(`${metric.name}${suffix};dur=${value}`);
      }
    }
  }

  getTimings() {
    return this._metrics.join(', ');
  }

  async flush() {
    if (this._metrics.length === 0) {
      return;
    }
    console.log(this.getTimings());
    this._metrics = [];
  }
}

export class InfluxMetricsProvider implements IMetricsProviderRepository {
  private metrics: string[] = [];
  constructor(
    private influxApiToken: string | undefined,
    private environment: string,
    private writeUrl: string | undefined,
  ) {}

  pushMetric(metric: Metric) {
    const point = new Point(metric.name);
    for (const [key, value] of metric.tags) {
      point.tag(key, value);
    }
    for (const [key, { value }] of metric.fields) {
      point.intField(key, value);
    }
    const influxLineProtocol = point.toLineProtocol()?.toString();
    if (influxLineProtocol) {
      this.metrics.push(influxLineProtocol);
    }
  }

  async flush() {
    if (this.metrics.length === 0) {
      return;
    }
    const metrics = this.metrics.join('\n');
    this.metrics = [];
    if (this.environment === 'prod' && this.writeUrl) {
      const response = await fetch(this.writeUrl, {
        method: 'POST',
        body: metrics,
        headers: {
          Authorization: `Token ${this.influxApiToken ?? ''}`,
        },
      });
      if (!response.ok) {
        console.error('Failed to push metrics', response.status, response.statusText);
      }
      await response.body?.cancel();
    } else {
      console.log(metrics);
    }
  }
}

export class Metric {
  private _tags: Map<string, string> = new Map();
  private _timestamp = performance.now();
  private _fields = new Map<string, { value: number; type: 'duration' | 'int' }>();
  private constructor(private _name: string) {}

  static create(name: string) {
    return new Metric(name);
  }

  get tags() {
    return this._tags;
  }

  get fields() {
    return this._fields;
  }

  get name() {
    return this._name;
  }

  addTag(key: string, value: string) {
    this._tags.set(key, value);
    return this;
  }

  addTags(tags: { [key: string]: string }) {
    for (const [key, value] of Object.entries(tags)) {
      this._tags.set(key, value);
    }
    return this;
  }

  durationField(key: string, duration?: number) {
    this._fields.set(key, { value: duration ?? performance.now() - this._timestamp, type: 'duration' });
    return this;
  }

  intField(key: string, value: number) {
    this._fields.set(key, { value, type: 'int' });
    return this;
  }
}

export class MetricsRepository implements IMetricsRepository {
  constructor(
    private operationPrefix: string,
    private metricsProviders: IMetricsProviderRepository[],
    private readonly defaultTags: { [key: string]: string } = {},
  ) {}

  monitorAsyncFunction<A extends unknown[], R>(
    operation: Operation,
    call: AsyncFn<A, R>,
    options: Options = {},
  ): AsyncFn<A, R> {
    operation = { ...operation, tags: { ...operation.tags, ...this.defaultTags } };
    const callback = (metric: Metric) => {
      for (const provider of this.metricsProviders) {
        provider.pushMetric(metric);
      }
    };

    return monitorAsyncFunction(this.operationPrefix, operation, call, callback, options);
  }

  push(metric: Metric) {
    metric.addTags(this.defaultTags);
    for (const provider of this.metricsProviders) {
      provider.pushMetric(metric);
    }
  }

  async flush() {
    await Promise.all(this.metricsProviders.map((provider) => provider.flush()));
  }
}

export class NoopMetricsRepository implements IMetricsRepository {
  monitorAsyncFunction<A extends unknown[], R>(_operation: Operation, call: AsyncFn<A, R>): AsyncFn<A, R> {
    return call;
  }

  push(): void {}
}

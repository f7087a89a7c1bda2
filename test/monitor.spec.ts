import { monitorAsyncFunction } from '../src/monitor';
import { InvalidTileIdError } from '../src/pmtiles/errors';
import { Metric } from '../src/repository';

describe('monitorAsyncFunction', () => {
  let metrics: Metric[];
  const write = (metric: Metric) => {
    metrics.push(metric);
  };

  beforeEach(() => {
    metrics = [];
  });

  it('records invocations and duration', async () => {
    const monitored = monitorAsyncFunction('pmtiles', { name: 'add', tags: { kind: 'math' } }, async (a: number, b: number) => a + b, write);

    expect(await monitored(2, 3)).toBe(5);
    expect(metrics).toHaveLength(1);
    expect(metrics[0].name).toBe('pmtiles_add');
    expect(metrics[0].tags.get('kind')).toBe('math');
    expect(metrics[0].fields.get('invocation')).toEqual({ value: 1, type: 'int' });
    expect(metrics[0].fields.get('duration')?.type).toBe('duration');
    expect(metrics[0].fields.has('errors')).toBe(false);
  });

  it('skips the invocation count when asked to', async () => {
    await monitorAsyncFunction('pmtiles', { name: 'noop' }, async () => undefined, write, { monitorInvocations: false })();
    expect(metrics[0].fields.has('invocation')).toBe(false);
  });

  it('counts and logs unexpected errors before rethrowing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');
    const monitored = monitorAsyncFunction('pmtiles', { name: 'fail' }, async () => {
      throw failure;
    }, write);

    await expect(monitored()).rejects.toBe(failure);
    expect(metrics[0].fields.get('errors')).toEqual({ value: 1, type: 'int' });
    expect(error).toHaveBeenCalledWith(failure, 'fail_errors');
    error.mockRestore();
  });

  it('does not count accepted errors', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const monitored = monitorAsyncFunction(
      'pmtiles',
      { name: 'lookup' },
      async () => {
        throw new InvalidTileIdError('bad tile');
      },
      write,
      { acceptedErrors: [InvalidTileIdError] },
    );

    await expect(monitored()).rejects.toBeInstanceOf(InvalidTileIdError);
    expect(metrics[0].fields.has('errors')).toBe(false);
    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });
});

import { AsyncFn, Operation, Options } from './interface';
import { Metric } from './repository';

export function monitorAsyncFunction<A extends unknown[], R>(
  operationPrefix: string,
  operation: Operation,
  call: AsyncFn<A, R>,
  metricsWriteCallback: (metric: Metric) => void,
  options: Options = {},
): AsyncFn<A, R> {
  const { name: operationName, tags = {} } = operation;
  const { monitorInvocations = true, acceptedErrors = [] } = options;

  return async (...args: A) => {
    const metric = Metric.create(`${operationPrefix}_${operationName}`);
    metric.addTags(tags);

    if (monitorInvocations) {
      metric.intField('invocation', 1);
    }

    try {
      return await call(...args);
    } catch (e) {
      if (!acceptedErrors.some((acceptedError) => e instanceof acceptedError)) {
        console.error(e, `${operationName}_errors`);
        metric.intField('errors', 1);
      }
      throw e;
    } finally {
      metric.durationField('duration');
      metricsWriteCallback(metric);
    }
  };
}

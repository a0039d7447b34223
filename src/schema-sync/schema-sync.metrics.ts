import { makeCounterProvider } from '@willsoto/nestjs-prometheus';

export const SYNC_OPERATIONS_METRIC = 'schema_sync_operations_total';

export const syncOperationsCounter = makeCounterProvider({
  name: SYNC_OPERATIONS_METRIC,
  help: 'Design synchronization operations by operation and outcome',
  labelNames: ['operation', 'outcome'],
});

export type { ExecutionOptions, ExecutionStatus, SimpleExecution, SimpleResult } from './types';

export { SimpleExecutionHost } from './simple-host';

export { combineSignals } from './utils';

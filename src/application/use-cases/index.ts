/**
 * Use Cases Barrel Export
 */
export { ProcessFileUseCase } from './process-file.use-case';
export { ProcessBatchUseCase } from './process-batch.use-case';

// Batch conversion module
// Directory traversal, job planning and summary aggregation

export { BatchOrchestrator, summarize } from './orchestrator';
export { BatchRunner, type BatchRunnerConfig } from './runner';
export { formatSummary } from './report';
export { listSourceFiles, assertReadableDirectory } from './traverse';
export { TARGET_FORMATS, sourceFormatOf, destinationRelativePath } from './formats';

export * from './types/dataset';
export * from './types/report';
export { loadDataset } from './ingestion/loader';
export { buildDataset, getColumn, numericColumns, categoricalColumns } from './ingestion/dataset';
export { createSampleDataset } from './ingestion/sample';
export { ANALYTICAL_COLUMNS, MOVIE_COLUMN_KINDS, findSchemaGaps } from './ingestion/schema';
export * from './eda/config';
export * from './eda/errors';
export type { EdaLogger } from './eda/logger';
export { consoleLogger, silentLogger } from './eda/logger';
export { inspectStructure } from './eda/inspector';
export * from './eda/quality';
export * from './eda/univariate';
export * from './eda/bivariate';
export * from './eda/insights';
export { analyzeDataset, runEdaPipeline } from './eda/pipeline';
export type { EdaRun, EdaRunOptions } from './eda/pipeline';
export { formatReport } from './eda/report';
export { dataRoot, defaultSourcePath } from './paths';

export type { Queryable } from './queryable';
export { runQuery } from './queryable';
export { PostgresDocumentRepository } from './document-repository';
export { PostgresFindingRepository } from './finding-repository';
export { PostgresMetricsRepository } from './metrics-repository';

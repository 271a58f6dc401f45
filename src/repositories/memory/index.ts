export { InMemoryDocumentRepository } from './document-repository';
export { InMemoryFindingRepository } from './finding-repository';
export { InMemoryMetricsRepository } from './metrics-repository';

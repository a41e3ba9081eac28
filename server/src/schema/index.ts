export * from './app';
export * from './indexing-jobs';
export * from './document-tasks';
export * from './replay-events';
export * from './index-documents';

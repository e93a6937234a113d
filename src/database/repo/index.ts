export * from './vector_index';

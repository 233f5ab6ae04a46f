export * from './chunk-text';
export * from './cosine-similarity';

export * from './upload-validation.exception';
export * from './session-not-found.exception';
export * from './rate-limit.exception';
export * from './internal.errors';

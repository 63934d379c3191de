export * from './users.schema';
export * from './submissions.schema';
export * from './rate-limits.schema';

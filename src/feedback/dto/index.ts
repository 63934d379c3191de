export * from './bulk-status.dto';
export * from './inbox-query.dto';
export * from './update-feedback-status.dto';
export * from './update-note.dto';

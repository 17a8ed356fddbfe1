export * from './bookmarkRegistry';
export * from './codec';
export * from './config';
export * from './conflictResolver';
export * from './documentCache';
export * from './documentMigration';
export * from './errors';
export * from './events';
export * from './fileAccess';
export * from './fileVersions';
export * from './keyedQueue';
export * from './listPaths';
export * from './logger';
export * from './merge';
export * from './snapshotStore';
export * from './storage';
export * from './syncEngine';

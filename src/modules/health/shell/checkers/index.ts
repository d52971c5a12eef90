export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export {
  makeSnapshotHealthChecker,
  type SnapshotLoader,
  type SnapshotHealthCheckerOptions,
} from './snapshot-checker.js';

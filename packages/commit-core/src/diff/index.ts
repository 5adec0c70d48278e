/**
 * Diff model module
 */

export { parseDiff, unquotePath } from './parse-diff';
export {
  summarizeChangeSet,
  computeFileStats,
  countHunkChanges,
  changedLines,
  type FileStats,
  type ChangeSetStats,
} from './stats';

export {
  RecordVersionService,
  diffSnapshots,
  parseRecordVersionInput,
  parseRestoreVersionInput,
  versionChain,
  type RecordVersionDependencies,
} from './recordVersionService.js';
export * from './types.js';

export {
  POLICY_CHAIN,
  REVIEW_CHAIN,
  RetentionEngine,
  mapRowToPolicy,
  mapRowToRecord,
  mapRowToReview,
  parseActorInput,
  parseCompleteReviewInput,
  parseCreatePolicyInput,
  parseCreateReviewInput,
  parseDisposalInput,
  parseExtendRetentionInput,
  parseRecordHoldInput,
  parseRegisterRecordInput,
  recordChain,
  type RetentionEngineDependencies,
} from './retentionEngine.js';
export * from './types.js';

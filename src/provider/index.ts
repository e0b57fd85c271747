/**
 * Lifecycle Providers
 */

export type {
  ProviderCallOptions,
  ConfigurationEntry,
  DesiredConfiguration,
  StateFetcher,
  ConfigurationWriter,
  LifecycleProvider,
} from "./types.js";

export {
  S3LifecycleProvider,
  createS3LifecycleProvider,
  mapS3Rule,
  mapS3Configuration,
  buildS3Rule,
  MINIMUM_OBJECT_SIZE_ATTRIBUTE,
  type S3Rule,
  type S3LifecycleProviderConfig,
} from "./s3-provider.js";

export {
  InMemoryLifecycleProvider,
  type MemoryRuleMetadata,
  type MemoryBucketSeed,
} from "./memory-provider.js";

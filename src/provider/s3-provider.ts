/**
 * S3 Lifecycle Provider
 *
 * Reads and replaces bucket lifecycle configurations through the AWS SDK.
 * Declared fields map onto the S3 schema one to one; everything else on a
 * fetched rule (noncurrent-version clauses, multipart aborts, tag and size
 * filters) rides along in `raw` and is written back untouched.
 */

import {
  S3Client,
  GetBucketLifecycleConfigurationCommand,
  PutBucketLifecycleConfigurationCommand,
  DeleteBucketLifecycleCommand,
  paginateListObjectsV2,
  type LifecycleRule as S3Rule,
  type LifecycleRuleFilter,
  type LifecycleExpiration,
  type S3ClientConfig,
  type Transition as S3Transition,
  type TransitionDefaultMinimumObjectSize,
  type TransitionStorageClass,
} from "@aws-sdk/client-s3";
import { classifyApplyError, classifyFetchError } from "../aws-errors.js";
import {
  emptyProviderState,
  err,
  ok,
  type ApplyError,
  type Expiration,
  type FetchError,
  type LifecycleRule,
  type ProviderRule,
  type ProviderState,
  type Result,
  type StorageClass,
  type Target,
  type Transition,
} from "../types.js";
import type { ConfigurationEntry, DesiredConfiguration, LifecycleProvider, ProviderCallOptions } from "./types.js";

export type { S3Rule };

export type S3LifecycleProviderConfig = {
  region?: string;
  credentials?: S3ClientConfig["credentials"];
  /** Pre-built client; used for every region when set */
  client?: S3Client;
  expectedBucketOwner?: string;
};

export const MINIMUM_OBJECT_SIZE_ATTRIBUTE = "transitionDefaultMinimumObjectSize";

// ============================================================================
// Storage class mapping
// ============================================================================

const FROM_S3_CLASS: Partial<Record<string, StorageClass>> = {
  STANDARD_IA: "INFREQUENT_ACCESS",
  GLACIER: "ARCHIVE",
  DEEP_ARCHIVE: "DEEP_ARCHIVE",
};

/** STANDARD has no S3 transition counterpart: objects start there. */
const TO_S3_CLASS: Record<StorageClass, TransitionStorageClass | undefined> = {
  STANDARD: undefined,
  INFREQUENT_ACCESS: "STANDARD_IA",
  ARCHIVE: "GLACIER",
  DEEP_ARCHIVE: "DEEP_ARCHIVE",
};

function toMinimumObjectSize(value: string | undefined): TransitionDefaultMinimumObjectSize | undefined {
  return value === "all_storage_classes_128K" || value === "varies_by_storage_class" ? value : undefined;
}

// ============================================================================
// S3 → model
// ============================================================================

export function mapS3Rule(rule: S3Rule & { ID: string }): ProviderRule<S3Rule> {
  let opaque = false;

  const transitions: Transition[] = [];
  for (const t of rule.Transitions ?? []) {
    const storageClass = t.StorageClass ? FROM_S3_CLASS[t.StorageClass] : undefined;
    if (t.Days === undefined || t.Date !== undefined || !storageClass) {
      opaque = true;
      continue;
    }
    transitions.push({ afterDays: t.Days, storageClass });
  }

  let expiration: Expiration | undefined;
  if (rule.Expiration?.Date !== undefined) {
    opaque = true;
  } else if (rule.Expiration?.Days !== undefined) {
    expiration = { afterDays: rule.Expiration.Days };
  }

  return {
    id: rule.ID,
    prefixFilter: rule.Filter?.Prefix ?? rule.Filter?.And?.Prefix ?? rule.Prefix ?? "",
    status: rule.Status === "Enabled" ? "ENABLED" : "DISABLED",
    transitions,
    ...(expiration ? { expiration } : {}),
    ...(opaque ? { opaque } : {}),
    raw: rule,
  };
}

export function mapS3Configuration(
  rules: S3Rule[],
  minimumObjectSize?: string,
): ProviderState<S3Rule> {
  const state = emptyProviderState<S3Rule>();
  for (const rule of rules) {
    const id = rule.ID;
    if (id) state.rules.push(mapS3Rule({ ...rule, ID: id }));
    else state.anonymous.push(rule);
  }
  if (minimumObjectSize) {
    state.attributes = { [MINIMUM_OBJECT_SIZE_ATTRIBUTE]: minimumObjectSize };
  }
  return state;
}

// ============================================================================
// Model → S3
// ============================================================================

function buildFilter(prefix: string, base?: LifecycleRuleFilter): LifecycleRuleFilter {
  if (base?.And) {
    return { And: { ...base.And, Prefix: prefix } };
  }
  const hasSize = base?.ObjectSizeGreaterThan !== undefined || base?.ObjectSizeLessThan !== undefined;
  if (base && (base.Tag || hasSize)) {
    if (prefix === "") return base;
    return {
      And: {
        Prefix: prefix,
        Tags: base.Tag ? [base.Tag] : undefined,
        ObjectSizeGreaterThan: base.ObjectSizeGreaterThan,
        ObjectSizeLessThan: base.ObjectSizeLessThan,
      },
    };
  }
  return { Prefix: prefix };
}

function buildExpiration(expiration: Expiration | undefined, base?: LifecycleExpiration): LifecycleExpiration | undefined {
  if (expiration) return { Days: expiration.afterDays };
  // A bare delete-marker cleanup clause is provider-only and survives updates
  if (base?.ExpiredObjectDeleteMarker !== undefined && base.Days === undefined && base.Date === undefined) {
    return { ExpiredObjectDeleteMarker: base.ExpiredObjectDeleteMarker };
  }
  return undefined;
}

/**
 * Declared fields over the provider's own record. Fails when a transition has
 * no S3 storage class.
 */
export function buildS3Rule(rule: Omit<LifecycleRule, "requiresHook">, base?: S3Rule): Result<S3Rule, string> {
  const transitions: S3Transition[] = [];
  for (const t of rule.transitions) {
    const storageClass = TO_S3_CLASS[t.storageClass];
    if (!storageClass) {
      return err(`Rule '${rule.id}': ${t.storageClass} is not a valid S3 transition storage class`);
    }
    transitions.push({ Days: t.afterDays, StorageClass: storageClass });
  }

  return ok({
    ...base,
    ID: rule.id,
    Status: rule.status === "ENABLED" ? "Enabled" : "Disabled",
    Filter: buildFilter(rule.prefixFilter, base?.Filter),
    Prefix: undefined,
    Transitions: transitions.length > 0 ? transitions : undefined,
    Expiration: buildExpiration(rule.expiration, base?.Expiration),
  });
}

function buildEntry(entry: ConfigurationEntry<S3Rule>): Result<S3Rule, string> {
  if (entry.source === "provider") {
    return entry.rule.raw ? ok(entry.rule.raw) : buildS3Rule(entry.rule);
  }
  return buildS3Rule(entry.rule, entry.base?.raw);
}

// ============================================================================
// Provider
// ============================================================================

export class S3LifecycleProvider implements LifecycleProvider<S3Rule> {
  readonly name = "s3";

  private readonly clients = new Map<string, S3Client>();
  private readonly defaultRegion: string;

  constructor(private readonly config: S3LifecycleProviderConfig = {}) {
    this.defaultRegion = config.region || process.env.AWS_REGION || "us-east-1";
  }

  private getClient(region?: string): S3Client {
    if (this.config.client) return this.config.client;
    const resolved = region || this.defaultRegion;
    let client = this.clients.get(resolved);
    if (!client) {
      client = new S3Client({ region: resolved, credentials: this.config.credentials });
      this.clients.set(resolved, client);
    }
    return client;
  }

  async fetch(target: Target, options: ProviderCallOptions = {}): Promise<Result<ProviderState<S3Rule>, FetchError>> {
    const client = this.getClient(target.region);
    try {
      const response = await client.send(
        new GetBucketLifecycleConfigurationCommand({
          Bucket: target.bucket,
          ExpectedBucketOwner: this.config.expectedBucketOwner,
        }),
        { abortSignal: options.signal },
      );
      return ok(mapS3Configuration(response.Rules ?? [], response.TransitionDefaultMinimumObjectSize));
    } catch (error) {
      if (error instanceof Error && error.name === "NoSuchLifecycleConfiguration") {
        return ok(emptyProviderState<S3Rule>());
      }
      return err(classifyFetchError(error));
    }
  }

  async putConfiguration(
    target: Target,
    configuration: DesiredConfiguration<S3Rule>,
    options: ProviderCallOptions = {},
  ): Promise<Result<void, ApplyError>> {
    const rules: S3Rule[] = [];
    for (const entry of configuration.entries) {
      const built = buildEntry(entry);
      if (!built.ok) return err({ kind: "Terminal", message: built.error, code: "InvalidStorageClass" });
      rules.push(built.value);
    }
    rules.push(...configuration.anonymous);

    const client = this.getClient(target.region);
    try {
      if (rules.length === 0) {
        // S3 rejects an empty rule list; no rules means no configuration
        await client.send(
          new DeleteBucketLifecycleCommand({
            Bucket: target.bucket,
            ExpectedBucketOwner: this.config.expectedBucketOwner,
          }),
          { abortSignal: options.signal },
        );
        return ok(undefined);
      }

      await client.send(
        new PutBucketLifecycleConfigurationCommand({
          Bucket: target.bucket,
          ExpectedBucketOwner: this.config.expectedBucketOwner,
          LifecycleConfiguration: { Rules: rules },
          TransitionDefaultMinimumObjectSize: toMinimumObjectSize(
            configuration.attributes[MINIMUM_OBJECT_SIZE_ATTRIBUTE],
          ),
        }),
        { abortSignal: options.signal },
      );
      return ok(undefined);
    } catch (error) {
      return err(classifyApplyError(error));
    }
  }

  async *listObjectKeys(target: Target, prefix: string, options: ProviderCallOptions = {}): AsyncIterable<string> {
    const pages = paginateListObjectsV2(
      { client: this.getClient(target.region), pageSize: 1000 },
      { Bucket: target.bucket, Prefix: prefix || undefined },
    );
    for await (const page of pages) {
      for (const object of page.Contents ?? []) {
        if (object.Key) yield object.Key;
      }
      if (options.signal?.aborted) return;
    }
  }
}

export function createS3LifecycleProvider(config?: S3LifecycleProviderConfig): S3LifecycleProvider {
  return new S3LifecycleProvider(config);
}

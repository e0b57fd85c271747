/**
 * In-Memory Lifecycle Provider
 *
 * Process-local stand-in for an object store's lifecycle API with the same
 * whole-configuration-replace semantics. Used for testing and local dry runs;
 * supports injected failures and artificial latency.
 */

import {
  emptyProviderState,
  err,
  ok,
  targetKey,
  type ApplyError,
  type FetchError,
  type ProviderRule,
  type ProviderState,
  type Result,
  type Target,
} from "../types.js";
import type { DesiredConfiguration, LifecycleProvider, ProviderCallOptions } from "./types.js";

/** Provider-side metadata the declared model never sees */
export type MemoryRuleMetadata = Record<string, unknown>;

type Bucket = {
  state: ProviderState<MemoryRuleMetadata>;
  objects: string[];
};

export type MemoryBucketSeed = {
  rules?: ProviderRule<MemoryRuleMetadata>[];
  anonymous?: MemoryRuleMetadata[];
  attributes?: Record<string, string>;
  objects?: string[];
};

function cloneState(state: ProviderState<MemoryRuleMetadata>): ProviderState<MemoryRuleMetadata> {
  return structuredClone(state);
}

export class InMemoryLifecycleProvider implements LifecycleProvider<MemoryRuleMetadata> {
  readonly name = "memory";

  private readonly buckets = new Map<string, Bucket>();
  private readonly fetchFailures: FetchError[] = [];
  private readonly putFailures: ApplyError[] = [];
  private latencyMs = 0;
  private revision = 0;

  fetchCalls = 0;
  putCalls = 0;

  createBucket(target: Target, seed: MemoryBucketSeed = {}): void {
    this.buckets.set(targetKey(target), {
      state: cloneState({
        rules: seed.rules ?? [],
        anonymous: seed.anonymous ?? [],
        attributes: seed.attributes ?? {},
      }),
      objects: [...(seed.objects ?? [])],
    });
  }

  /** Current configuration, or undefined when the bucket does not exist */
  getState(target: Target): ProviderState<MemoryRuleMetadata> | undefined {
    const bucket = this.buckets.get(targetKey(target));
    return bucket ? cloneState(bucket.state) : undefined;
  }

  failFetch(error: FetchError, times = 1): void {
    for (let i = 0; i < times; i++) this.fetchFailures.push(error);
  }

  failPut(error: ApplyError, times = 1): void {
    for (let i = 0; i < times; i++) this.putFailures.push(error);
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  async fetch(
    target: Target,
    _options?: ProviderCallOptions,
  ): Promise<Result<ProviderState<MemoryRuleMetadata>, FetchError>> {
    this.fetchCalls += 1;
    await this.wait();

    const failure = this.fetchFailures.shift();
    if (failure) return err(failure);

    const bucket = this.buckets.get(targetKey(target));
    if (!bucket) return err({ kind: "NotFound", message: `Bucket '${target.bucket}' does not exist` });
    return ok(cloneState(bucket.state));
  }

  async putConfiguration(
    target: Target,
    configuration: DesiredConfiguration<MemoryRuleMetadata>,
    _options?: ProviderCallOptions,
  ): Promise<Result<void, ApplyError>> {
    this.putCalls += 1;
    await this.wait();

    const failure = this.putFailures.shift();
    if (failure) return err(failure);

    const bucket = this.buckets.get(targetKey(target));
    if (!bucket) return err({ kind: "Terminal", message: `Bucket '${target.bucket}' does not exist`, code: "NoSuchBucket" });

    this.revision += 1;
    const rules = configuration.entries.map((entry): ProviderRule<MemoryRuleMetadata> => {
      if (entry.source === "provider") return entry.rule;
      const { requiresHook: _local, ...declared } = entry.rule;
      return { ...declared, raw: { ...entry.base?.raw, revision: this.revision } };
    });

    bucket.state = rules.length === 0 && configuration.anonymous.length === 0
      ? emptyProviderState<MemoryRuleMetadata>()
      : cloneState({ rules, anonymous: configuration.anonymous, attributes: { ...configuration.attributes } });
    return ok(undefined);
  }

  async *listObjectKeys(target: Target, prefix: string, _options?: ProviderCallOptions): AsyncIterable<string> {
    const bucket = this.buckets.get(targetKey(target));
    if (!bucket) return;
    for (const key of bucket.objects) {
      if (key.startsWith(prefix)) yield key;
    }
  }

  private async wait(): Promise<void> {
    if (this.latencyMs > 0) {
      await new Promise<void>((r) => setTimeout(r, this.latencyMs));
    }
  }
}

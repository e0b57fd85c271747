/**
 * Provider Boundary Types
 *
 * The provider API replaces the whole lifecycle configuration on every write,
 * so writers receive a complete configuration assembled by the applier, never
 * a per-rule patch.
 */

import type {
  ApplyError,
  FetchError,
  LifecycleRule,
  ProviderRule,
  ProviderState,
  Result,
  Target,
} from "../types.js";

export type ProviderCallOptions = {
  signal?: AbortSignal;
};

/**
 * One rule of a configuration about to be written.
 *
 * - `provider`: an existing rule, written back exactly as it was read.
 * - `declared`: a declared rule; when `base` is set, the provider fields the
 *   model does not cover are carried over from it.
 */
export type ConfigurationEntry<TRaw> =
  | { source: "provider"; rule: ProviderRule<TRaw> }
  | { source: "declared"; rule: LifecycleRule; base?: ProviderRule<TRaw> };

export type DesiredConfiguration<TRaw> = {
  entries: ConfigurationEntry<TRaw>[];
  anonymous: TRaw[];
  attributes: Readonly<Record<string, string>>;
};

export interface StateFetcher<TRaw = unknown> {
  fetch(target: Target, options?: ProviderCallOptions): Promise<Result<ProviderState<TRaw>, FetchError>>;
}

export interface ConfigurationWriter<TRaw = unknown> {
  putConfiguration(
    target: Target,
    configuration: DesiredConfiguration<TRaw>,
    options?: ProviderCallOptions,
  ): Promise<Result<void, ApplyError>>;
}

export interface LifecycleProvider<TRaw = unknown> extends StateFetcher<TRaw>, ConfigurationWriter<TRaw> {
  readonly name: string;
  /** Lazily enumerates object keys under a prefix, for pre-transition hooks */
  listObjectKeys?(target: Target, prefix: string, options?: ProviderCallOptions): AsyncIterable<string>;
}

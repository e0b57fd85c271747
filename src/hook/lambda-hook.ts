/**
 * Lambda Pre-Transition Hook
 *
 * Invokes a Lambda function with the rule and a sample of the object keys it
 * covers. The function approves by returning normally; it rejects by raising
 * (FunctionError) or by returning `{ "approved": false, "reason"?: string }`.
 */

import { InvokeCommand, LambdaClient, type InvokeCommandOutput, type LambdaClientConfig } from "@aws-sdk/client-lambda";
import { formatErrorMessage, isTransientAWSError } from "../aws-errors.js";
import { RETRY_DEFAULTS, retryResult, type RetryConfig } from "../retry.js";
import { err, ok, type HookError, type LifecycleRule, type Result, type Target } from "../types.js";
import type { HookInvokeOptions, PreTransitionHook } from "./types.js";

export type LambdaHookConfig = {
  functionName: string;
  region?: string;
  credentials?: LambdaClientConfig["credentials"];
  client?: LambdaClient;
  /** Object keys sent with each invocation */
  sampleSize?: number;
  /** Invocation attempts, including the first; only throttling, 5xx and network failures are retried */
  maxAttempts?: number;
  retry?: Omit<RetryConfig, "attempts">;
};

type InvokeFailure = { transient: boolean; message: string };

export type HookPayload = {
  target: { bucket: string; region?: string };
  rule: LifecycleRule;
  objectKeys: string[];
  truncated: boolean;
};

export const DEFAULT_SAMPLE_SIZE = 100;

async function takeSample(
  keys: AsyncIterable<string>,
  size: number,
  signal?: AbortSignal,
): Promise<{ objectKeys: string[]; truncated: boolean }> {
  const objectKeys: string[] = [];
  for await (const key of keys) {
    if (objectKeys.length >= size || signal?.aborted) return { objectKeys, truncated: true };
    objectKeys.push(key);
  }
  return { objectKeys, truncated: false };
}

function rejection(payload: string | undefined): string | undefined {
  if (!payload) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    // Non-JSON responses count as approval
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || !("approved" in parsed) || parsed.approved !== false) {
    return undefined;
  }
  return "reason" in parsed && typeof parsed.reason === "string" ? parsed.reason : "rejected by hook";
}

export class LambdaPreTransitionHook implements PreTransitionHook {
  readonly name: string;

  private readonly client: LambdaClient;
  private readonly sampleSize: number;
  private readonly maxAttempts: number;

  constructor(private readonly config: LambdaHookConfig) {
    this.name = `lambda:${config.functionName}`;
    this.client =
      config.client ??
      new LambdaClient({
        region: config.region || process.env.AWS_REGION || "us-east-1",
        credentials: config.credentials,
      });
    this.sampleSize = Math.max(0, config.sampleSize ?? DEFAULT_SAMPLE_SIZE);
    this.maxAttempts = Math.max(1, config.maxAttempts ?? RETRY_DEFAULTS.attempts);
  }

  async invoke(
    target: Target,
    rule: LifecycleRule,
    candidateObjects: AsyncIterable<string>,
    options: HookInvokeOptions = {},
  ): Promise<Result<void, HookError>> {
    let sample: { objectKeys: string[]; truncated: boolean };
    try {
      sample = await takeSample(candidateObjects, this.sampleSize, options.signal);
    } catch (error) {
      return err({ kind: "Rejected", message: formatErrorMessage(error) });
    }
    const payload: HookPayload = {
      target: { bucket: target.bucket, region: target.region },
      rule,
      ...sample,
    };

    const { result } = await retryResult<InvokeCommandOutput, InvokeFailure>(
      () => this.send(payload, options.signal),
      {
        ...this.config.retry,
        attempts: this.maxAttempts,
        label: `invoke ${this.config.functionName}`,
        shouldRetry: (failure) => failure.transient,
        signal: options.signal,
      },
    );
    if (!result.ok) return err({ kind: "Rejected", message: result.error.message });

    const response = result.value;
    const body = response.Payload ? Buffer.from(response.Payload).toString() : undefined;
    if (response.FunctionError) {
      return err({ kind: "Rejected", message: `${this.config.functionName} failed: ${response.FunctionError}` });
    }
    const status = response.StatusCode ?? 0;
    if (status < 200 || status >= 300) {
      return err({ kind: "Rejected", message: `${this.config.functionName} returned status ${status}` });
    }
    const reason = rejection(body);
    if (reason !== undefined) return err({ kind: "Rejected", message: reason });

    return ok(undefined);
  }

  private async send(payload: HookPayload, signal?: AbortSignal): Promise<Result<InvokeCommandOutput, InvokeFailure>> {
    try {
      const response = await this.client.send(
        new InvokeCommand({
          FunctionName: this.config.functionName,
          InvocationType: "RequestResponse",
          Payload: Buffer.from(JSON.stringify(payload)),
        }),
        { abortSignal: signal },
      );
      return ok(response);
    } catch (error) {
      return err({ transient: isTransientAWSError(error), message: formatErrorMessage(error) });
    }
  }
}

/**
 * Rule-set document schema
 *
 * TypeBox definitions for the JSON documents the CLI reads rule sets from.
 * The schema checks shape only; ordering and uniqueness are left to
 * `validateRuleSet` so that both paths report them the same way.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { err, ok, type LifecycleRule, type Result, type RuleSet, type ValidationError } from "../types.js";

export const StorageClassSchema = Type.Union([
  Type.Literal("STANDARD"),
  Type.Literal("INFREQUENT_ACCESS"),
  Type.Literal("ARCHIVE"),
  Type.Literal("DEEP_ARCHIVE"),
]);

export const TransitionSchema = Type.Object(
  {
    afterDays: Type.Number({ description: "Days after object creation" }),
    storageClass: StorageClassSchema,
  },
  { additionalProperties: false },
);

export const LifecycleRuleSchema = Type.Object(
  {
    id: Type.String({ description: "Stable rule identity" }),
    prefix: Type.Optional(Type.String({ description: "Object key prefix; empty or omitted matches all objects" })),
    status: Type.Optional(Type.Union([Type.Literal("ENABLED"), Type.Literal("DISABLED")])),
    transitions: Type.Optional(Type.Array(TransitionSchema)),
    expiration: Type.Optional(
      Type.Object({ afterDays: Type.Number() }, { additionalProperties: false }),
    ),
    requiresHook: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export const RuleSetDocumentSchema = Type.Object({
  version: Type.Optional(Type.Literal(1)),
  rules: Type.Array(LifecycleRuleSchema),
});

export type RuleSetDocument = Static<typeof RuleSetDocumentSchema>;
export type LifecycleRuleDocument = Static<typeof LifecycleRuleSchema>;

function toRule(doc: LifecycleRuleDocument): LifecycleRule {
  return {
    id: doc.id,
    prefixFilter: doc.prefix ?? "",
    status: doc.status ?? "ENABLED",
    transitions: (doc.transitions ?? []).map((t) => ({ afterDays: t.afterDays, storageClass: t.storageClass })),
    ...(doc.expiration ? { expiration: { afterDays: doc.expiration.afterDays } } : {}),
    requiresHook: doc.requiresHook ?? false,
  };
}

/**
 * Check a parsed JSON value against the document schema and map it onto the
 * rule model.
 */
export function parseRuleSetDocument(value: unknown): Result<RuleSet, ValidationError[]> {
  if (Check(RuleSetDocumentSchema, value)) {
    return ok(value.rules.map(toRule));
  }

  const errors: ValidationError[] = [];
  for (const error of Errors(RuleSetDocumentSchema, value)) {
    errors.push({ code: "SCHEMA", path: error.path || "/", message: error.message });
  }
  return err(errors.length > 0 ? errors : [{ code: "SCHEMA", path: "/", message: "Document does not match the rule set schema" }]);
}

export async function loadRuleSetFile(filePath: string): Promise<Result<RuleSet, ValidationError[]>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err([{ code: "SCHEMA", path: "/", message: `Cannot read rule set file: ${message}` }]);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err([{ code: "SCHEMA", path: "/", message: `Rule set file is not valid JSON: ${message}` }]);
  }

  return parseRuleSetDocument(value);
}

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { BatchParams } from "./types.js";
import { InvalidArgumentError } from "./errors.js";

export const MAX_CONCURRENCY = 64;

export const BatchParamsSchema = Type.Object({
  source_path: Type.String({
    minLength: 1,
    description: "Directory holding the exported memories (loose files, folders, archives)",
  }),
  dest_path: Type.String({
    minLength: 1,
    description: "Directory that receives restored files; created when missing",
  }),
  overwrite: Type.Boolean({
    default: false,
    description: "Re-process entries whose output already exists (any extension)",
  }),
  dry_run: Type.Optional(
    Type.Boolean({
      description: "Classify and validate pairs without writing or extracting anything",
    }),
  ),
  concurrency: Type.Optional(
    Type.Integer({
      minimum: 1,
      maximum: MAX_CONCURRENCY,
      description: "Number of entries processed at once",
    }),
  ),
  fail_fast: Type.Optional(
    Type.Boolean({
      description: "Abort the batch on the first failed entry instead of recording it",
    }),
  ),
});

/**
 * Validate untrusted batch parameters. Every failing field is listed in the
 * InvalidArgumentError message.
 */
export function parseBatchParams(input: unknown): BatchParams {
  if (Value.Check(BatchParamsSchema, input)) {
    return input;
  }
  const problems = [...Value.Errors(BatchParamsSchema, input)].map(
    (e) => `${e.path || "/"}: ${e.message}`,
  );
  throw new InvalidArgumentError(`Invalid batch parameters: ${problems.join("; ")}`, "<params>");
}

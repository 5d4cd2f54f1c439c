import { z } from "zod";
import { ConfigurationError } from "../errors.js";

// YAML happily yields numbers, booleans and nulls where we want text.
export const OptionalText = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform(v => (v === null || v === undefined ? "" : String(v)));

export const RequiredText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(v => String(v))
  .refine(v => v.length > 0, { message: "must not be empty" });

export function describeIssues(err: z.ZodError): string {
  return err.issues
    .map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

export function parseFields<S extends z.ZodTypeAny>(schema: S, fields: unknown, where: string): z.output<S> {
  const res = schema.safeParse(fields);
  if (!res.success) throw new ConfigurationError(`${where}: ${describeIssues(res.error)}`);
  return res.data;
}

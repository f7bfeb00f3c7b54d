/**
 * graphql-param-client
 *
 * Response Envelope Module
 *
 * zod schemas for the JSON the endpoint answers with, and the logic that
 * turns an envelope into either its data map or a {@link GraphqlError}.
 */

import * as z from 'zod';
import { DecodeError, GraphqlError } from './errors.js';

export const ErrorLocationSchema = z.object({
  line: z.number().int(),
  column: z.number().int(),
});

export const ValidationErrorSchema = z.object({
  message: z.string(),
  inputPath: z.array(z.string()),
});

export const ErrorExtensionsSchema = z.object({
  errorType: z.string().nullish(),
  errorCode: z.string().nullish(),
  errorDescription: z.string().nullish(),
  errorClass: z.string().nullish(),
  validationErrors: z.array(ValidationErrorSchema).nullish(),
});

export type ErrorExtensions = z.output<typeof ErrorExtensionsSchema>;

/**
 * One entry of the `errors` array. Missing collections decode as empty, and
 * numeric path segments (list indices) are kept as strings.
 */
export const WireErrorSchema = z.object({
  message: z.string().nullish(),
  locations: z.array(ErrorLocationSchema).nullish().transform((value) => value ?? []),
  path: z
    .array(z.union([z.string(), z.number().transform(String)]))
    .nullish()
    .transform((value) => value ?? []),
  extensions: ErrorExtensionsSchema.nullish().transform((value): ErrorExtensions => value ?? {}),
});

export type WireError = z.output<typeof WireErrorSchema>;

export const ResponseEnvelopeSchema = z.object({
  errors: z.array(WireErrorSchema).nullish(),
  data: z.record(z.string(), z.unknown()).nullish(),
});

export type ResponseEnvelope = z.output<typeof ResponseEnvelopeSchema>;

/**
 * Flattens zod issues into `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validates a parsed response body and returns its data map.
 *
 * @throws {DecodeError} If the body is not an envelope, or has neither errors nor data
 * @throws {GraphqlError} If the envelope carries at least one error
 */
export function unwrapEnvelope(body: unknown): Record<string, unknown> {
  const parsed = ResponseEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new DecodeError('Response does not match the GraphQL envelope', formatIssues(parsed.error));
  }

  const { errors, data } = parsed.data;
  if (errors && errors.length > 0) {
    throw new GraphqlError(errors);
  }
  if (!data) {
    throw new DecodeError('Response has no data');
  }
  return data;
}

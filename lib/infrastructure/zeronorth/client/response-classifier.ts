/**
 * Response Classifier
 *
 * The ZeroNorth API reports failures inside response bodies
 * (`{"statusCode":404,"error":"Not Found","message":"..."}`), so every body
 * passes through here before callers look at it.
 */

import type { z } from "zod";
import { ApiError, EmptyResponseError, MalformedResponseError } from "../errors";
import { ErrorBodySchema } from "../types/api-responses";
import type { HttpResult } from "./http-client";

export type ErrorKind =
  | { kind: "api"; code: number }
  | { kind: "empty" }
  | { kind: "malformed" };

export type Classification =
  | { ok: true; body: unknown }
  | ({ ok: false; message: string; raw: string } & ErrorKind);

function readErrorCode(parsed: unknown): number | undefined {
  const result = ErrorBodySchema.safeParse(parsed);
  if (!result.success || Array.isArray(parsed)) {
    return undefined;
  }

  const { statusCode, status } = result.data;
  if (typeof statusCode === "number") {
    return statusCode;
  }
  // A top-level string status (e.g. "FINISHED" on job documents) is not an error code
  return typeof status === "number" ? status : undefined;
}

function readErrorMessage(parsed: unknown, raw: string): string {
  const result = ErrorBodySchema.safeParse(parsed);
  if (!result.success) {
    return raw;
  }
  const { message, error } = result.data;
  if (typeof message === "string" && message) {
    return message;
  }
  if (typeof error === "string" && error) {
    return error;
  }
  return raw;
}

/**
 * Classify a raw response body.
 *
 * @param httpStatus - transport status, used when the body carries no error code of its own
 */
export function classifyResponse(body: string, httpStatus?: number): Classification {
  if (body.trim() === "") {
    if (httpStatus !== undefined && httpStatus > 299) {
      return { ok: false, kind: "api", code: httpStatus, message: `HTTP ${httpStatus}`, raw: body };
    }
    return { ok: false, kind: "empty", message: "Empty response body", raw: body };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { ok: false, kind: "malformed", message: "Response body is not valid JSON", raw: body };
  }

  const code = readErrorCode(parsed) ?? (httpStatus !== undefined && httpStatus > 299 ? httpStatus : undefined);
  if (code !== undefined && code > 299) {
    return { ok: false, kind: "api", code, message: readErrorMessage(parsed, body), raw: body };
  }

  return { ok: true, body: parsed };
}

export function classifyResult(result: HttpResult): Classification {
  return classifyResponse(result.body, result.status);
}

/**
 * Convert a failed classification into the matching error
 */
export function toError(
  classification: Exclude<Classification, { ok: true }>,
  endpoint?: string,
): ApiError | EmptyResponseError | MalformedResponseError {
  switch (classification.kind) {
    case "api":
      return new ApiError(classification.message, classification.code, endpoint, classification.raw);
    case "empty":
      return new EmptyResponseError(endpoint);
    case "malformed":
      return new MalformedResponseError(classification.message, endpoint, classification.raw);
  }
}

/**
 * Classify an HTTP result and return the parsed body, throwing on any failure
 */
export function expectOk(result: HttpResult): unknown {
  const classification = classifyResult(result);
  if (!classification.ok) {
    throw toError(classification, result.endpoint);
  }
  return classification.body;
}

/**
 * For action calls (upload, resume, fail, update, delete) whose answer is not
 * read: only an API error fails. An empty or non-JSON success body passes.
 */
export function expectAccepted(result: HttpResult): void {
  const classification = classifyResult(result);
  if (!classification.ok && classification.kind === "api") {
    throw toError(classification, result.endpoint);
  }
}

/**
 * Classify and validate against a schema. A 200-shaped body that lacks the
 * expected fields is reported as MalformedResponseError.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, result: HttpResult): z.infer<T> {
  const body = expectOk(result);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MalformedResponseError(`Unexpected response shape (${issues})`, result.endpoint, result.body);
  }
  return parsed.data;
}

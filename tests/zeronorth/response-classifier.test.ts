import { z } from "zod";
import { describe, expect, it } from "vitest";
import {
  classifyResponse,
  expectAccepted,
  expectOk,
  parseWith,
  toError,
} from "../../lib/infrastructure/zeronorth/client/response-classifier";
import {
  ApiError,
  describeError,
  EmptyResponseError,
  MalformedResponseError,
} from "../../lib/infrastructure/zeronorth/errors";

describe("classifyResponse", () => {
  it("should report an embedded statusCode as an API error", () => {
    const body = '{"statusCode":404,"error":"Not Found","message":"No such policy"}';

    expect(classifyResponse(body)).toEqual({
      ok: false,
      kind: "api",
      code: 404,
      message: "No such policy",
      raw: body,
    });
  });

  it("should fall back to the error field when there is no message", () => {
    const result = classifyResponse('{"statusCode":500,"error":"Internal Server Error"}');

    expect(result).toMatchObject({ ok: false, kind: "api", code: 500, message: "Internal Server Error" });
  });

  it("should accept a numeric top-level status as the error code", () => {
    expect(classifyResponse('{"status":401,"message":"Unauthorized"}')).toMatchObject({
      ok: false,
      kind: "api",
      code: 401,
    });
  });

  it("should treat a job status string as a normal field", () => {
    expect(classifyResponse('{"id":"j-1","status":"FINISHED"}')).toEqual({
      ok: true,
      body: { id: "j-1", status: "FINISHED" },
    });
  });

  it("should accept a 2xx statusCode", () => {
    expect(classifyResponse('{"statusCode":200,"id":"x"}')).toEqual({
      ok: true,
      body: { statusCode: 200, id: "x" },
    });
  });

  it("should report an empty body", () => {
    expect(classifyResponse("")).toMatchObject({ ok: false, kind: "empty" });
    expect(classifyResponse("  \n")).toMatchObject({ ok: false, kind: "empty" });
  });

  it("should report an empty body with an error status as an API error", () => {
    expect(classifyResponse("", 500)).toEqual({ ok: false, kind: "api", code: 500, message: "HTTP 500", raw: "" });
    expect(classifyResponse("", 204)).toMatchObject({ ok: false, kind: "empty" });
  });

  it("should report a body that is not JSON", () => {
    expect(classifyResponse("<html>Bad Gateway</html>")).toEqual({
      ok: false,
      kind: "malformed",
      message: "Response body is not valid JSON",
      raw: "<html>Bad Gateway</html>",
    });
  });

  it("should use the transport status when the body has no code", () => {
    expect(classifyResponse('{"message":"Service unavailable"}', 503)).toMatchObject({
      ok: false,
      kind: "api",
      code: 503,
      message: "Service unavailable",
    });
  });

  it("should pass list documents through", () => {
    expect(classifyResponse('[[{"id":"a"}],{"count":1}]', 200)).toEqual({
      ok: true,
      body: [[{ id: "a" }], { count: 1 }],
    });
  });
});

describe("toError", () => {
  it("should map each failure kind to its error class", () => {
    expect(toError({ ok: false, kind: "api", code: 409, message: "Conflict", raw: "{}" }, "/targets")).toBeInstanceOf(
      ApiError,
    );
    expect(toError({ ok: false, kind: "empty", message: "Empty response body", raw: "" })).toBeInstanceOf(
      EmptyResponseError,
    );
    expect(toError({ ok: false, kind: "malformed", message: "bad", raw: "x" })).toBeInstanceOf(MalformedResponseError);
  });
});

describe("expectOk and parseWith", () => {
  const result = (body: string, status = 200) => ({ status, body, endpoint: "/policies/p-1/run" });

  it("should return the parsed body", () => {
    expect(expectOk(result('{"jobId":"j-1"}'))).toEqual({ jobId: "j-1" });
  });

  it("should throw ApiError carrying the code and endpoint", () => {
    const error = (() => {
      try {
        expectOk(result('{"statusCode":403,"message":"Forbidden"}', 403));
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 403, endpoint: "/policies/p-1/run", message: "Forbidden" });
  });

  it("should report a well-formed body of the wrong shape as malformed", () => {
    const schema = z.object({ jobId: z.string() });

    expect(() => parseWith(schema, result('{"id":"x"}'))).toThrow(
      "Unexpected response shape (jobId: Required)",
    );
  });

  it("should render the raw payload in diagnostics", () => {
    const error = new ApiError("Forbidden", 403, "/accounts/me", '{"statusCode":403}');

    expect(describeError(error)).toBe('Forbidden (HTTP 403) with message:\n{"statusCode":403}');
    expect(describeError(new EmptyResponseError())).toBe("Unexpected empty result from the API call");
    expect(describeError("plain")).toBe("plain");
  });
});

describe("expectAccepted", () => {
  const result = (body: string, status = 200) => ({ status, body, endpoint: "/jobs/j-1/resume" });

  it("should accept an empty or non-JSON success body", () => {
    expect(() => expectAccepted(result(""))).not.toThrow();
    expect(() => expectAccepted(result("OK"))).not.toThrow();
    expect(() => expectAccepted(result('{"id":"j-1"}'))).not.toThrow();
  });

  it("should throw ApiError for an error body or status", () => {
    expect(() => expectAccepted(result('{"statusCode":409,"message":"Job is not paused"}'))).toThrow(
      new ApiError("Job is not paused", 409),
    );
    expect(() => expectAccepted(result("", 502))).toThrow(ApiError);
  });
});

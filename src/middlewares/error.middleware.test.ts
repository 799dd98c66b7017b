import { describe, it, expect, vi } from "vitest";
import { createMockRequest, createMockResponse } from "../../tests/mocks/express";
import { CatalogFormatError } from "../types/response/error.response";
import { errorMiddleware } from "./error.middleware";

describe("errorMiddleware", () => {
  it("uses the status of an application error", () => {
    const { res, mock } = createMockResponse();

    errorMiddleware(
      new CatalogFormatError("workouts.yaml", "expected a list of records"),
      createMockRequest({}),
      res,
      vi.fn()
    );

    expect(mock.statusCode).toBe(422);
    expect(mock.body).toEqual({
      success: false,
      message: "workouts.yaml: expected a list of records",
    });
  });

  it("keeps the status of body parser errors", () => {
    const { res, mock } = createMockResponse();
    const parseError = Object.assign(new SyntaxError("Unexpected token } in JSON"), {
      status: 400,
    });

    errorMiddleware(parseError, createMockRequest({}), res, vi.fn());

    expect(mock.statusCode).toBe(400);
  });

  it("falls back to 500", () => {
    const { res, mock } = createMockResponse();

    errorMiddleware("boom", createMockRequest({}), res, vi.fn());

    expect(mock.statusCode).toBe(500);
    expect(mock.body).toEqual({ success: false, message: "Unknown error occurred" });
  });
});

import type { NextFunction, Request, Response } from "express";
import {
  ConflictError,
  ExternalServiceError,
  NotFoundError,
  PermissionError,
  ValidationError,
} from "@samurai/shared/errors.js";
import { errorHandler, notFoundHandler } from "../errorHandler";

function mockResponse() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

const req = { method: "GET", originalUrl: "/api/assets/a1", path: "/api/nowhere" } as unknown as Request;
const next: NextFunction = jest.fn();

function handle(err: unknown) {
  const res = mockResponse();
  errorHandler(err, req, res as unknown as Response, next);
  return res;
}

describe("errorHandler", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns validation issues with a 400", () => {
    const res = handle(new ValidationError("Seat count must be zero or greater", [
      { path: "seatCount", message: "Seat count must be zero or greater" },
    ]));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: "Seat count must be zero or greater",
      code: "validation_failed",
      details: [{ path: "seatCount", message: "Seat count must be zero or greater" }],
    });
  });

  it.each([
    [new PermissionError("Permission denied: asset:delete"), 403, "forbidden"],
    [new NotFoundError("Software asset", "a1"), 404, "not_found"],
    [new ConflictError("Asset a1 was modified by someone else", 3), 409, "conflict"],
    [new ExternalServiceError("gemini", "empty reply"), 502, "external_service_error"],
  ])("maps %p to its status", (err, status, code) => {
    const res = handle(err);
    expect(res.status).toHaveBeenCalledWith(status);
    expect(res.json).toHaveBeenCalledWith({ error: err.message, code });
  });

  it("hides unexpected errors behind a 500", () => {
    const res = handle(new TypeError("cannot read properties of undefined"));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: "Internal server error", code: "internal_error" });
    expect(console.error).toHaveBeenCalled();
  });

  it("treats a malformed JSON body as a validation failure", () => {
    const syntax = Object.assign(new SyntaxError("Unexpected token"), { body: "{oops" });
    const res = handle(syntax);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "Malformed JSON body", code: "validation_failed" });
  });
});

describe("notFoundHandler", () => {
  it("answers unknown API routes with a 404", () => {
    const res = mockResponse();
    notFoundHandler(req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: "No route for GET /api/nowhere", code: "not_found" });
  });
});

import { afterEach, describe, expect, it, vi } from "vitest";
import { AnalyzeError } from "./errors";
import { errorResponse } from "./http";

describe("errorResponse", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers client errors with 400 and their message", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});

    const res = errorResponse(new AnalyzeError("empty_file", "The uploaded file is empty"), "analyze");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "The uploaded file is empty" });
  });

  it("hides unexpected failures behind a generic 500", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const boom = new Error("stack details");

    const res = errorResponse(boom, "analyze");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "Internal server error" });
    expect(error).toHaveBeenCalledWith("[csv-insight]", "analyze failed:", boom);
  });
});

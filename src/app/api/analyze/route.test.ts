import { describe, expect, it } from "vitest";
import { POST } from "./route";

function uploadRequest(file?: File): Request {
  const form = new FormData();
  if (file) form.append("file", file);
  return new Request("http://localhost/api/analyze", { method: "POST", body: form });
}

describe("POST /api/analyze", () => {
  it("returns counts, stats and preview for a CSV upload", async () => {
    const res = await POST(uploadRequest(new File(["a,b\n1,2\n3,4\n"], "data.csv", { type: "text/csv" })));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      filename: "data.csv",
      rows: 2,
      cols: 2,
      numericColumns: ["a", "b"],
      stats: {
        a: { count: 2, min: 1, max: 3, mean: 2, sum: 4 },
        b: { count: 2, min: 2, max: 4, mean: 3, sum: 6 },
      },
      preview: [
        { a: 1, b: 2 },
        { a: 3, b: 4 },
      ],
    });
  });

  it("rejects a non-CSV filename", async () => {
    const res = await POST(uploadRequest(new File(["a\n1\n"], "data.txt")));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "Only .csv files are accepted" });
  });

  it("rejects an empty file", async () => {
    const res = await POST(uploadRequest(new File([], "data.csv")));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "The uploaded file is empty" });
  });

  it("includes the parser message on malformed CSV", async () => {
    const res = await POST(uploadRequest(new File(["a,b\n1,2,3\n"], "data.csv")));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: "Failed to read CSV: Expected 2 fields in line 2, saw 3",
    });
  });

  it("rejects a form without a file field", async () => {
    const res = await POST(uploadRequest());

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "No file provided" });
  });

  it("rejects a body that is not multipart", async () => {
    const res = await POST(
      new Request("http://localhost/api/analyze", {
        method: "POST",
        body: "a,b\n1,2\n",
        headers: { "Content-Type": "text/plain" },
      })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "No file provided" });
  });
});

import { describe, expect, it } from "vitest";
import { AnalyzeError } from "@/lib/errors";
import { analysisResultSchema } from "@/lib/validators/schemas";
import { analyzeUpload } from "./analyze";

const encode = (text: string) => new TextEncoder().encode(text);

function captureError(run: () => unknown): AnalyzeError {
  try {
    run();
  } catch (err) {
    if (err instanceof AnalyzeError) return err;
    throw err;
  }
  throw new Error("expected an AnalyzeError");
}

describe("analyzeUpload", () => {
  it("summarizes a comma separated file", () => {
    const result = analyzeUpload({ filename: "data.csv", bytes: encode("a,b\n1,2\n3,4\n") });

    expect(result).toEqual({
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

  it("detects semicolons and leaves text columns out of the stats", () => {
    const result = analyzeUpload({ filename: "data.csv", bytes: encode("a;b\n1;x\n2;y\n") });

    expect(result.numericColumns).toEqual(["a"]);
    expect(result.stats).toEqual({ a: { count: 2, min: 1, max: 2, mean: 1.5, sum: 3 } });
    expect(result.preview).toEqual([
      { a: 1, b: "x" },
      { a: 2, b: "y" },
    ]);
  });

  it("reads Latin-1 uploads", () => {
    const bytes = Uint8Array.from("nome;valor\nJosé;10\n", (char) => char.charCodeAt(0));
    const result = analyzeUpload({ filename: "vendas.csv", bytes });

    expect(result.numericColumns).toEqual(["valor"]);
    expect(result.preview).toEqual([{ nome: "José", valor: 10 }]);
  });

  it("counts missing values out of the stats and blanks them in the preview", () => {
    const result = analyzeUpload({ filename: "data.csv", bytes: encode("a,b\n1,\n2,\n") });

    expect(result.numericColumns).toEqual(["a", "b"]);
    expect(result.stats.b).toEqual({ count: 0, min: null, max: null, mean: null, sum: 0 });
    expect(result.preview).toEqual([
      { a: 1, b: "" },
      { a: 2, b: "" },
    ]);
  });

  it("reports every row but previews at most twenty", () => {
    const lines = ["n", ...Array.from({ length: 30 }, (_, i) => String(i + 1))];
    const result = analyzeUpload({ filename: "data.csv", bytes: encode(lines.join("\n")) });

    expect(result.rows).toBe(30);
    expect(result.cols).toBe(1);
    expect(result.preview).toHaveLength(20);
    expect(result.stats.n).toEqual({ count: 30, min: 1, max: 30, mean: 15.5, sum: 465 });
  });

  it("uses the sniffer it is given", () => {
    const result = analyzeUpload(
      { filename: "data.csv", bytes: encode("a,b\n1,2\n") },
      { sniffer: { sniff: () => ";" } }
    );

    expect(result.cols).toBe(1);
    expect(result.numericColumns).toEqual([]);
    expect(result.preview).toEqual([{ "a,b": "1,2" }]);
  });

  it("keeps a column named __proto__ in stats and preview", () => {
    const result = analyzeUpload({ filename: "data.csv", bytes: encode("__proto__,b\n1,2\n") });

    expect(result.numericColumns).toEqual(["__proto__", "b"]);
    expect(Object.entries(result.stats)).toEqual([
      ["__proto__", { count: 1, min: 1, max: 1, mean: 1, sum: 1 }],
      ["b", { count: 1, min: 2, max: 2, mean: 2, sum: 2 }],
    ]);
    expect(result.preview.map((row) => Object.entries(row))).toEqual([
      [
        ["__proto__", 1],
        ["b", 2],
      ],
    ]);
  });

  it("produces a payload that survives the JSON round trip with infinite cells", async () => {
    const result = analyzeUpload({ filename: "data.csv", bytes: encode("a\n1\ninf\n") });
    const wire: unknown = await Response.json(result).json();

    const parsed = analysisResultSchema.safeParse(wire);
    expect(parsed.success).toBe(true);
    expect(result.preview).toEqual([{ a: 1 }, { a: "inf" }]);
    expect(result.stats.a).toEqual({ count: 2, min: 1, max: null, mean: null, sum: null });
  });

  it("rejects files that are not .csv", () => {
    const err = captureError(() => analyzeUpload({ filename: "data.txt", bytes: encode("a\n1\n") }));
    expect(err.kind).toBe("unsupported_file_type");
    expect(err.message).toBe("Only .csv files are accepted");
  });

  it("matches the extension case-sensitively", () => {
    const err = captureError(() => analyzeUpload({ filename: "DATA.CSV", bytes: encode("a\n1\n") }));
    expect(err.kind).toBe("unsupported_file_type");
  });

  it("rejects empty files", () => {
    const err = captureError(() => analyzeUpload({ filename: "data.csv", bytes: new Uint8Array(0) }));
    expect(err.kind).toBe("empty_file");
    expect(err.message).toBe("The uploaded file is empty");
  });

  it("prefixes parse failures", () => {
    const err = captureError(() =>
      analyzeUpload({ filename: "data.csv", bytes: encode("a,b\n1,2\n3,4,5\n") })
    );
    expect(err.kind).toBe("parse_failure");
    expect(err.message).toBe("Failed to read CSV: Expected 2 fields in line 3, saw 3");
  });
});

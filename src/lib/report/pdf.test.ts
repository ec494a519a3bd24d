import { describe, expect, it } from "vitest";
import en from "@/i18n/locales/en/common.json";
import type { AnalysisResult } from "@/types";
import { buildReportPdf, pageFooter, previewTable, reportFilename, statsBody, type Translate } from "./pdf";

const translate: Translate = (key) => en[key];

const result: AnalysisResult = {
  filename: "sales.csv",
  rows: 2,
  cols: 7,
  numericColumns: ["amount"],
  stats: { amount: { count: 2, min: 1000, max: 2500.5, mean: 1750.25, sum: 3500.5 } },
  preview: [
    { a: "x", b: "y", c: "z", d: "w", e: "v", f: "a very long description that goes on", amount: 1000 },
    { a: "1", b: "2", c: "3", d: "4", e: "5", f: "", amount: 2500.5 },
  ],
};

describe("statsBody", () => {
  it("formats each numeric column in the report locale", () => {
    expect(statsBody(result, "pt-BR")).toEqual([["amount", "2", "1.000", "2.500,5", "1.750,25", "3.500,5"]]);
  });

  it("uses a dash for missing aggregates", () => {
    const empty: AnalysisResult = {
      ...result,
      stats: { amount: { count: 0, min: null, max: null, mean: null, sum: 0 } },
    };
    expect(statsBody(empty, "en-US")).toEqual([["amount", "0", "-", "-", "-", "0"]]);
  });
});

describe("previewTable", () => {
  it("keeps the first six columns and truncates long cells", () => {
    const { head, body } = previewTable(result);
    expect(head).toEqual(["a", "b", "c", "d", "e", "f"]);
    expect(body[0]?.[5]).toBe("a very long description that…");
    expect(body[1]).toEqual(["1", "2", "3", "4", "5", ""]);
  });

  it("is empty when there are no rows", () => {
    expect(previewTable({ ...result, preview: [] })).toEqual({ head: [], body: [] });
  });
});

describe("pageFooter", () => {
  it("numbers the page in the chosen language", () => {
    expect(pageFooter(translate, 1, 3)).toBe("Page 1 of 3");
  });
});

describe("reportFilename", () => {
  it("carries the language", () => {
    expect(reportFilename("es")).toBe("csv-insight-report-es.pdf");
  });
});

describe("buildReportPdf", () => {
  it("fits a small analysis on one page with a footer", () => {
    const doc = buildReportPdf(result, translate, "en-US");
    expect(doc.getNumberOfPages()).toBe(1);
    expect(doc.output()).toContain("(Page 1 of 1)");
  });
});

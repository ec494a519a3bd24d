"use client"

import { useTranslation } from "react-i18next"
import type { AnalysisResult } from "@/types"
import { formatCell, truncate } from "@/lib/format"

export function PreviewTable({ result }: { result: AnalysisResult }) {
  const { t } = useTranslation()
  const columns = Object.keys(result.preview[0] ?? {})
  if (columns.length === 0) {
    return <p className="text-sm text-muted-foreground">{t("noPreview")}</p>
  }

  return (
    <div className="max-h-[480px] overflow-auto">
      <table className="w-full text-sm">
        <thead className="sticky top-0 bg-card">
          <tr className="border-b text-left text-xs text-muted-foreground">
            <th className="px-3 py-2 font-medium">#</th>
            {columns.map((c) => (
              <th
                key={c}
                className={`whitespace-nowrap px-3 py-2 font-medium ${result.numericColumns.includes(c) ? "text-right" : ""}`}
              >
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {result.preview.map((row, i) => (
            <tr key={i} className="border-b last:border-0 hover:bg-muted/50">
              <td className="px-3 py-2 text-muted-foreground">{i + 1}</td>
              {columns.map((c) => (
                <td
                  key={c}
                  className={`whitespace-nowrap px-3 py-2 ${typeof row[c] === "number" ? "text-right tabular-nums" : ""}`}
                >
                  {truncate(formatCell(row[c]), 40)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

"use client"

import { useTranslation } from "react-i18next"
import type { AnalysisResult } from "@/types"
import { formatNumber } from "@/lib/format"

export function StatsTable({ result, locale }: { result: AnalysisResult; locale: string }) {
  const { t } = useTranslation()

  if (result.numericColumns.length === 0) {
    return <p className="text-sm text-muted-foreground">{t("noNumericCols")}</p>
  }

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm">
        <thead>
          <tr className="border-b text-left text-xs uppercase text-muted-foreground">
            <th className="px-3 py-2 font-medium">{t("col")}</th>
            <th className="px-3 py-2 text-right font-medium">{t("count")}</th>
            <th className="px-3 py-2 text-right font-medium">{t("min")}</th>
            <th className="px-3 py-2 text-right font-medium">{t("max")}</th>
            <th className="px-3 py-2 text-right font-medium">{t("mean")}</th>
            <th className="px-3 py-2 text-right font-medium">{t("sum")}</th>
          </tr>
        </thead>
        <tbody>
          {result.numericColumns.map((column) => {
            const s = result.stats[column]
            return (
              <tr key={column} className="border-b last:border-0 hover:bg-muted/50">
                <td className="px-3 py-2 font-medium">{column}</td>
                <td className="px-3 py-2 text-right tabular-nums">{s ? formatNumber(s.count, locale) : "-"}</td>
                <td className="px-3 py-2 text-right tabular-nums">{formatNumber(s?.min, locale)}</td>
                <td className="px-3 py-2 text-right tabular-nums">{formatNumber(s?.max, locale)}</td>
                <td className="px-3 py-2 text-right tabular-nums">{formatNumber(s?.mean, locale)}</td>
                <td className="px-3 py-2 text-right tabular-nums">{formatNumber(s?.sum, locale)}</td>
              </tr>
            )
          })}
        </tbody>
      </table>
    </div>
  )
}

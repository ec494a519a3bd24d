"use client"

import { useTranslation } from "react-i18next"
import type { AnalysisResult } from "@/types"
import { formatNumber, truncate } from "@/lib/format"

function StatCard({ label, value }: { label: string; value: React.ReactNode }) {
  return (
    <div className="rounded-xl border bg-card p-4 shadow-sm">
      <div className="text-xs uppercase tracking-wide text-muted-foreground">{label}</div>
      <div className="mt-1 truncate text-2xl font-semibold">{value}</div>
    </div>
  )
}

export function SummaryCards({ result, locale }: { result: AnalysisResult; locale: string }) {
  const { t } = useTranslation()

  return (
    <div className="grid grid-cols-2 gap-3 md:grid-cols-4">
      <StatCard label={t("fileShort")} value={truncate(result.filename, 32)} />
      <StatCard label={t("rowsShort")} value={formatNumber(result.rows, locale)} />
      <StatCard label={t("colsShort")} value={formatNumber(result.cols, locale)} />
      <StatCard label={t("numericShort")} value={result.numericColumns.length} />
    </div>
  )
}

"use client"

import { useMemo } from "react"
import { LineChart as LineChartIcon } from "lucide-react"
import { useTranslation } from "react-i18next"
import { CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts"
import type { AnalysisResult } from "@/types"
import { chartPoints } from "@/lib/chart"
import { formatNumber } from "@/lib/format"

interface ColumnChartProps {
  result: AnalysisResult
  column: string
  locale: string
  onColumnChange: (column: string) => void
}

export function ColumnChart({ result, column, locale, onColumnChange }: ColumnChartProps) {
  const { t } = useTranslation()
  const data = useMemo(() => chartPoints(result.preview, column), [result.preview, column])

  return (
    <section className="rounded-xl border bg-card p-5 shadow-sm">
      <div className="mb-4 flex flex-wrap items-center justify-between gap-2">
        <span className="flex items-center gap-2 text-sm font-semibold">
          <LineChartIcon className="h-4 w-4 text-primary" />
          {t("chartTitle")}
        </span>
        {result.numericColumns.length > 0 && (
          <label className="flex items-center gap-2 text-xs text-muted-foreground">
            {t("yColumn")}
            <select
              value={column}
              onChange={(e) => onColumnChange(e.target.value)}
              className="rounded-md border bg-card px-2 py-1 text-sm text-foreground"
            >
              {result.numericColumns.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </label>
        )}
      </div>

      {result.numericColumns.length === 0 ? (
        <p className="text-sm text-muted-foreground">{t("noNumericToPlot")}</p>
      ) : data.length === 0 ? (
        <p className="text-sm text-muted-foreground">{t("emptyChart")}</p>
      ) : (
        <div className="h-72 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <LineChart data={data} margin={{ top: 8, right: 16, bottom: 0, left: 0 }}>
              <CartesianGrid strokeDasharray="3 3" stroke="var(--border)" />
              <XAxis dataKey="idx" stroke="var(--muted-foreground)" fontSize={12} />
              <YAxis
                stroke="var(--muted-foreground)"
                fontSize={12}
                tickFormatter={(value: number) => formatNumber(value, locale)}
              />
              <Tooltip
                formatter={(value) => (typeof value === "number" ? formatNumber(value, locale) : value)}
                contentStyle={{ background: "var(--card)", border: "1px solid var(--border)", borderRadius: 8 }}
              />
              <Line type="monotone" dataKey="value" name={column} stroke="var(--primary)" strokeWidth={2} dot={false} />
            </LineChart>
          </ResponsiveContainer>
        </div>
      )}
    </section>
  )
}

"use client"

import { useEffect } from "react"
import { AlertCircle, BarChart3 } from "lucide-react"
import { useTranslation } from "react-i18next"
import { useCsvAnalysis } from "@/hooks/use-csv-analysis"
import { ApiStatus } from "@/components/indicators/api-status"
import { Footer } from "@/components/footer"
import { LanguageSwitcher } from "@/components/language-switcher"
import { ThemeToggle } from "@/components/theme-toggle"
import { UploadPanel } from "@/components/upload/upload-panel"
import { ColumnChart } from "@/components/results/column-chart"
import { SummaryCards } from "@/components/results/summary-cards"
import { StatsTable } from "@/components/results/stats-table"
import { PreviewTable } from "@/components/results/preview-table"

export function AppShell() {
  const { t } = useTranslation()
  const {
    file,
    result,
    loading,
    error,
    apiStatus,
    chartColumn,
    locale,
    setFile,
    setChartColumn,
    analyze,
    exportPdf,
    pingApi,
    clearAll,
  } = useCsvAnalysis()

  useEffect(() => {
    void pingApi()
  }, [pingApi])

  return (
    <div className="mx-auto flex min-h-screen max-w-6xl flex-col px-4 py-6 md:px-6">
      <header className="mb-8 flex flex-wrap items-center justify-between gap-3">
        <div>
          <div className="flex items-center gap-2 text-lg font-bold">
            <BarChart3 className="h-5 w-5 text-primary" />
            {t("appTitle")}
          </div>
          <p className="text-xs text-muted-foreground">{t("caption")}</p>
        </div>
        <div className="flex items-center gap-2">
          <ApiStatus status={apiStatus} onPing={() => void pingApi()} />
          <LanguageSwitcher />
          <ThemeToggle />
        </div>
      </header>

      <main className="flex-1 space-y-5">
        <div>
          <h1 className="text-2xl font-bold">{t("heroTitle")}</h1>
          <p className="mt-1 text-sm text-muted-foreground">{t("heroText")}</p>
        </div>

        <UploadPanel
          file={file}
          loading={loading}
          canExport={result !== null}
          onFileChange={setFile}
          onAnalyze={() => void analyze()}
          onExport={exportPdf}
          onClear={clearAll}
        />

        {error && (
          <div
            className="flex items-center gap-2 rounded-lg border border-destructive/40 bg-destructive/10 px-4 py-3 text-sm text-destructive"
            role="alert"
          >
            <AlertCircle className="h-4 w-4 shrink-0" />
            <span>
              <span className="font-semibold">{t("error")}:</span> {error}
            </span>
          </div>
        )}

        {result && (
          <>
            <SummaryCards result={result} locale={locale} />
            <ColumnChart result={result} column={chartColumn} locale={locale} onColumnChange={setChartColumn} />
            <section className="rounded-xl border bg-card p-5 shadow-sm">
              <h2 className="mb-3 text-sm font-semibold">{t("statsTitle")}</h2>
              <StatsTable result={result} locale={locale} />
            </section>
            <section className="rounded-xl border bg-card p-5 shadow-sm">
              <div className="mb-3 flex items-center justify-between">
                <h2 className="text-sm font-semibold">{t("previewTitle")}</h2>
                <span className="text-xs text-muted-foreground">
                  {t("previewCount", { shown: result.preview.length, total: result.rows })}
                </span>
              </div>
              <PreviewTable result={result} />
            </section>
          </>
        )}
      </main>

      <Footer />
    </div>
  )
}

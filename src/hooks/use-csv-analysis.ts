"use client"

import { useCallback } from "react"
import { useTranslation } from "react-i18next"
import { csvInsightClient } from "@/lib/api/client"
import { buildReportPdf, reportFilename } from "@/lib/report/pdf"
import { DEFAULT_LANGUAGE, numberLocale } from "@/i18n"
import { useAnalysisStore } from "@/stores/analysis-store"

export function useCsvAnalysis() {
  const { t, i18n } = useTranslation()
  const {
    file,
    result,
    loading,
    error,
    apiStatus,
    chartColumn,
    setFile,
    setResult,
    setLoading,
    setError,
    setApiStatus,
    setChartColumn,
    clearAll,
  } = useAnalysisStore()

  const language = i18n.resolvedLanguage ?? DEFAULT_LANGUAGE
  const locale = numberLocale(language)

  const pingApi = useCallback(async () => {
    try {
      await csvInsightClient.healthCheck()
      setApiStatus("ok")
    } catch {
      setApiStatus("down")
    }
  }, [setApiStatus])

  const analyze = useCallback(async () => {
    setError(null)
    setResult(null)
    if (!file) {
      setError(t("errorNoFile"))
      return
    }

    setLoading(true)
    await pingApi()
    try {
      setResult(await csvInsightClient.analyze(file))
    } catch (err) {
      console.error("Analyze error:", err)
      setError(err instanceof Error ? err.message : t("errorGeneric"))
    } finally {
      setLoading(false)
    }
  }, [file, pingApi, setError, setLoading, setResult, t])

  const exportPdf = useCallback(() => {
    if (!result) return
    buildReportPdf(result, (key) => t(key), locale).save(reportFilename(language))
  }, [result, t, locale, language])

  return {
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
  }
}

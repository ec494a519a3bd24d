import { create } from "zustand"
import type { AnalysisResult } from "@/types"

export type ApiStatus = "unknown" | "ok" | "down"

interface AnalysisState {
  file: File | null
  result: AnalysisResult | null
  loading: boolean
  error: string | null
  apiStatus: ApiStatus
  /** Numeric column plotted in the chart; "" when there is none. */
  chartColumn: string

  setFile: (file: File | null) => void
  setResult: (result: AnalysisResult | null) => void
  setLoading: (loading: boolean) => void
  setError: (error: string | null) => void
  setApiStatus: (status: ApiStatus) => void
  setChartColumn: (column: string) => void
  clearAll: () => void
}

export const useAnalysisStore = create<AnalysisState>((set) => ({
  file: null,
  result: null,
  loading: false,
  error: null,
  apiStatus: "unknown",
  chartColumn: "",

  setFile: (file) => set({ file, result: null, error: null, chartColumn: "" }),
  setResult: (result) => set({ result, chartColumn: result?.numericColumns[0] ?? "" }),
  setLoading: (loading) => set({ loading }),
  setError: (error) => set({ error }),
  setApiStatus: (apiStatus) => set({ apiStatus }),
  setChartColumn: (chartColumn) => set({ chartColumn }),
  clearAll: () =>
    set({ file: null, result: null, loading: false, error: null, apiStatus: "unknown", chartColumn: "" }),
}))

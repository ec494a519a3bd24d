import { beforeEach, describe, expect, it } from "vitest"
import type { AnalysisResult } from "@/types"
import { useAnalysisStore } from "./analysis-store"

const result: AnalysisResult = {
  filename: "data.csv",
  rows: 0,
  cols: 1,
  numericColumns: [],
  stats: {},
  preview: [],
}

describe("useAnalysisStore", () => {
  beforeEach(() => {
    useAnalysisStore.getState().clearAll()
  })

  it("clears the previous result and error when a new file is picked", () => {
    const store = useAnalysisStore.getState()
    store.setResult(result)
    store.setError("Only .csv files are accepted")

    store.setFile(new File(["a\n1\n"], "next.csv"))

    const state = useAnalysisStore.getState()
    expect(state.file?.name).toBe("next.csv")
    expect(state.result).toBeNull()
    expect(state.error).toBeNull()
  })

  it("charts the first numeric column of a new result", () => {
    const store = useAnalysisStore.getState()
    store.setResult({ ...result, numericColumns: ["price", "qty"] })
    expect(useAnalysisStore.getState().chartColumn).toBe("price")

    store.setChartColumn("qty")
    expect(useAnalysisStore.getState().chartColumn).toBe("qty")

    store.setResult(result)
    expect(useAnalysisStore.getState().chartColumn).toBe("")
  })

  it("forgets the charted column when a new file is picked", () => {
    const store = useAnalysisStore.getState()
    store.setResult({ ...result, numericColumns: ["price"] })
    store.setFile(new File(["a"], "other.csv"))
    expect(useAnalysisStore.getState().chartColumn).toBe("")
  })

  it("resets everything on clearAll", () => {
    const store = useAnalysisStore.getState()
    store.setFile(new File(["a"], "data.csv"))
    store.setResult(result)
    store.setLoading(true)
    store.setApiStatus("ok")
    store.setChartColumn("a")

    store.clearAll()

    const state = useAnalysisStore.getState()
    expect(state.file).toBeNull()
    expect(state.result).toBeNull()
    expect(state.loading).toBe(false)
    expect(state.apiStatus).toBe("unknown")
    expect(state.chartColumn).toBe("")
  })
})

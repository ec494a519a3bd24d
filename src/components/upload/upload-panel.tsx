"use client"

import { useCallback, useRef } from "react"
import { FileDown, FileText, Loader2, Trash2, Upload } from "lucide-react"
import { useTranslation } from "react-i18next"

interface UploadPanelProps {
  file: File | null
  loading: boolean
  canExport: boolean
  onFileChange: (file: File | null) => void
  onAnalyze: () => void
  onExport: () => void
  onClear: () => void
}

const BUTTON = "inline-flex items-center gap-2 rounded-md px-4 py-2 text-sm font-medium transition-colors disabled:pointer-events-none disabled:opacity-50"

export function UploadPanel({ file, loading, canExport, onFileChange, onAnalyze, onExport, onClear }: UploadPanelProps) {
  const { t } = useTranslation()
  const inputRef = useRef<HTMLInputElement>(null)

  const handleFileChange = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      onFileChange(e.target.files?.[0] ?? null)
    },
    [onFileChange]
  )

  const handleClear = useCallback(() => {
    if (inputRef.current) inputRef.current.value = ""
    onClear()
  }, [onClear])

  return (
    <section className="rounded-xl border bg-card p-5 shadow-sm">
      <div className="mb-4 flex items-center justify-between">
        <span className="flex items-center gap-2 text-sm font-semibold">
          <FileText className="h-4 w-4 text-primary" />
          {t("csvFile")}
        </span>
        <span className="text-xs text-muted-foreground">
          {file ? `${(file.size / 1024).toFixed(1)} KB` : t("noFileSelected")}
        </span>
      </div>
      <div className="flex flex-wrap items-center gap-2">
        <input ref={inputRef} type="file" accept=".csv" className="hidden" onChange={handleFileChange} />
        <button
          type="button"
          className={`${BUTTON} max-w-xs border bg-card hover:bg-muted`}
          onClick={() => inputRef.current?.click()}
        >
          <Upload className="h-4 w-4 shrink-0" />
          <span className="truncate">{file ? file.name : t("chooseFile")}</span>
        </button>
        <button
          type="button"
          className={`${BUTTON} bg-primary text-primary-foreground hover:opacity-90`}
          disabled={!file || loading}
          onClick={onAnalyze}
        >
          {loading && <Loader2 className="h-4 w-4 animate-spin" />}
          {loading ? t("analyzing") : t("analyze")}
        </button>
        <button
          type="button"
          className={`${BUTTON} border bg-card hover:bg-muted`}
          disabled={!canExport || loading}
          onClick={onExport}
        >
          <FileDown className="h-4 w-4" />
          {t("exportPdf")}
        </button>
        <button type="button" className={`${BUTTON} text-muted-foreground hover:bg-muted`} disabled={loading} onClick={handleClear}>
          <Trash2 className="h-4 w-4" />
          {t("clear")}
        </button>
      </div>
    </section>
  )
}

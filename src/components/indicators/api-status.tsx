"use client"

import { Activity } from "lucide-react"
import { useTranslation } from "react-i18next"
import type { ApiStatus as Status } from "@/stores/analysis-store"

const LABEL_KEYS = { unknown: "status", ok: "online", down: "offline" } as const

const TONES: Record<Status, string> = {
  unknown: "border-border text-muted-foreground",
  ok: "border-success/40 bg-success/10 text-success",
  down: "border-destructive/40 bg-destructive/10 text-destructive",
}

export function ApiStatus({ status, onPing }: { status: Status; onPing: () => void }) {
  const { t } = useTranslation()

  return (
    <button
      type="button"
      className={`inline-flex items-center gap-1.5 rounded-full border px-3 py-1 text-xs font-medium ${TONES[status]}`}
      onClick={onPing}
      title={t("checkApi")}
    >
      <Activity className="h-3.5 w-3.5" />
      {t(LABEL_KEYS[status])}
    </button>
  )
}

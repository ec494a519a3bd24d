"use client"

import { useTheme } from "next-themes"
import { Moon, Sun } from "lucide-react"
import { useTranslation } from "react-i18next"

export function ThemeToggle() {
  const { t } = useTranslation()
  const { resolvedTheme, setTheme } = useTheme()
  const isDark = resolvedTheme === "dark"

  return (
    <button
      type="button"
      className="inline-flex h-9 w-9 items-center justify-center rounded-md border bg-card transition-colors hover:bg-muted"
      aria-label={isDark ? t("themeLight") : t("themeDark")}
      onClick={() => setTheme(isDark ? "light" : "dark")}
    >
      {isDark ? <Sun className="h-4 w-4" /> : <Moon className="h-4 w-4" />}
    </button>
  )
}

"use client"

import { Languages } from "lucide-react"
import { useTranslation } from "react-i18next"
import { DEFAULT_LANGUAGE, LANGUAGES, isLanguage, setAppLanguage } from "@/i18n"

const NAMES = { pt: "Português", en: "English", es: "Español" } as const

export function LanguageSwitcher() {
  const { t, i18n } = useTranslation()
  const current = i18n.resolvedLanguage ?? DEFAULT_LANGUAGE

  const handleChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
    const next = e.target.value
    if (!isLanguage(next)) return
    setAppLanguage(next).catch((err: unknown) => console.error("Language change failed:", err))
  }

  return (
    <label className="flex items-center gap-1.5 rounded-md border bg-card px-2 py-1 text-sm">
      <Languages className="h-4 w-4 text-muted-foreground" />
      <span className="sr-only">{t("language")}</span>
      <select value={current} onChange={handleChange} className="bg-transparent text-sm outline-none">
        {LANGUAGES.map((language) => (
          <option key={language} value={language}>
            {NAMES[language]}
          </option>
        ))}
      </select>
    </label>
  )
}

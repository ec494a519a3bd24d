"use client"

import { useEffect } from "react"
import { ThemeProvider } from "next-themes"
import { I18nextProvider } from "react-i18next"
import i18n, { readSavedLanguage, setAppLanguage } from "@/i18n"

export function Providers({ children }: { children: React.ReactNode }) {
  useEffect(() => {
    const saved = readSavedLanguage()
    if (saved) {
      setAppLanguage(saved).catch((err: unknown) => console.error("Language restore failed:", err))
    }
  }, [])

  return (
    <I18nextProvider i18n={i18n}>
      <ThemeProvider attribute="class" defaultTheme="dark" enableSystem disableTransitionOnChange>
        {children}
      </ThemeProvider>
    </I18nextProvider>
  )
}

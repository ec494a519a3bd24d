"use client"

import { useTranslation } from "react-i18next"

export function Footer() {
  const { t } = useTranslation()

  return (
    <footer className="mt-10 border-t py-6 text-center text-xs text-muted-foreground">
      {t("footer", { year: new Date().getFullYear() })}
    </footer>
  )
}

import i18n from "i18next";
import { initReactI18next } from "react-i18next";
import en from "./locales/en/common.json";
import es from "./locales/es/common.json";
import pt from "./locales/pt/common.json";

export const LANGUAGES = ["pt", "en", "es"] as const;
export type Language = (typeof LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = "en";

export const LANGUAGE_STORAGE_KEY = "csv-insight.lang";

const NUMBER_LOCALES: Record<Language, string> = {
  en: "en-US",
  es: "es-ES",
  pt: "pt-BR",
};

export const resources = {
  en: { common: en },
  es: { common: es },
  pt: { common: pt },
} as const;

export function isLanguage(value: unknown): value is Language {
  return typeof value === "string" && LANGUAGES.some((language) => language === value);
}

/** Intl locale used for numbers; unknown languages fall back to the default's. */
export function numberLocale(language: string | undefined): string {
  const base = language?.split("-")[0];
  return NUMBER_LOCALES[isLanguage(base) ? base : DEFAULT_LANGUAGE];
}

export function readSavedLanguage(): Language | null {
  if (typeof window === "undefined") return null;
  const saved = window.localStorage.getItem(LANGUAGE_STORAGE_KEY);
  return isLanguage(saved) ? saved : null;
}

export async function setAppLanguage(language: Language): Promise<void> {
  await i18n.changeLanguage(language);
  if (typeof window === "undefined") return;
  window.localStorage.setItem(LANGUAGE_STORAGE_KEY, language);
  document.documentElement.lang = language;
}

export const i18nReady = i18n.use(initReactI18next).init({
  resources,
  lng: DEFAULT_LANGUAGE,
  fallbackLng: DEFAULT_LANGUAGE,
  supportedLngs: [...LANGUAGES],
  defaultNS: "common",
  ns: ["common"],
  interpolation: { escapeValue: false },
});

export default i18n;

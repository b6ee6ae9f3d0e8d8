import i18next from "i18next";
import type { Language } from "../types";
import en from "./en.json";
import ru from "./ru.json";

export async function initI18n(language: Language): Promise<void> {
  if (!i18next.isInitialized) {
    await i18next.init({
      lng: language,
      fallbackLng: "en",
      resources: {
        en: { translation: en },
        ru: { translation: ru }
      },
      interpolation: { escapeValue: false }
    });
    return;
  }
  await i18next.changeLanguage(language);
}

export function t(key: string, values: Record<string, string | number> = {}): string {
  return String(i18next.t(key, values));
}

export function getCurrentLanguage(): Language {
  const lang = i18next.language;
  return lang.startsWith("ru") ? "ru" : "en";
}

export const translations = { en, ru };

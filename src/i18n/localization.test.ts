import { describe, expect, it } from "vitest";
import { getCurrentLanguage, initI18n, t, translations } from "./index";

describe("localization", () => {
  it("contains same keys in ru and en dictionaries", () => {
    const ruKeys = Object.keys(translations.ru).sort();
    const enKeys = Object.keys(translations.en).sort();
    expect(ruKeys).toEqual(enKeys);
  });

  it("interpolates values and switches language", async () => {
    await initI18n("en");
    expect(t("finalScore", { score: 12 })).toBe("Final score: 12");
    await initI18n("ru");
    expect(getCurrentLanguage()).toBe("ru");
    expect(t("gameOver")).toBe("Игра окончена");
    await initI18n("en");
  });
});

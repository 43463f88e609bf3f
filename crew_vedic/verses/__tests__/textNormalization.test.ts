import { describe, expect, it } from "vitest";
import {
  cleanMeaning,
  normalizeTags,
  normalizeText,
  stripDiacritics,
  tokenize,
} from "../textNormalization.js";

describe("normalizeText", () => {
  it("folds diacritics, case and punctuation", () => {
    expect(normalizeText("Pitṛ-Tarpaṇam!")).toBe("pitr tarpanam");
    expect(normalizeText("  Full   Moon. ")).toBe("full moon");
  });
});

describe("tokenize", () => {
  it("returns no tokens for blank input", () => {
    expect(tokenize(" ... ")).toEqual([]);
  });
});

describe("normalizeTags", () => {
  it("returns unique sorted tokens", () => {
    expect(normalizeTags(["Full Moon", "purnima", "moon", "Śiva"])).toEqual([
      "full",
      "moon",
      "purnima",
      "siva",
    ]);
  });
});

describe("display helpers", () => {
  it("strips diacritics and line breaks from transliteration", () => {
    expect(stripDiacritics("karmaṇy evādhikāras te\nmā phaleṣu")).toBe("karmany evadhikaras te ma phalesu");
  });

  it("drops a leading verse number from meanings", () => {
    expect(cleanMeaning("2.47   Your claim is on the work alone.")).toBe("Your claim is on the work alone.");
  });
});

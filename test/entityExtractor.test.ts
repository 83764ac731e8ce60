/**
 * ENTITY EXTRACTOR - COMPREHENSIVE TEST SUITE
 *
 * All report snippets are synthetic.
 */

import { describe, it, expect } from "vitest";
import {
  extractAllVariantCandidates,
  extractCnvs,
  extractDiagnosis,
  extractExonAlterations,
  extractFusions,
  extractNgsMethod,
  extractPatient,
  extractRecommendations,
  extractReportDate,
  extractTmb,
  extractVariantCandidates,
} from "../services/entityExtractor";
import { testVocabulary } from "./fixtures/vocabulary";

const REFERENCE_DATE = new Date(2024, 3, 3);

// ============================================================================
// PATIENT
// ============================================================================

describe("extractPatient", () => {
  it("should read Italian labelled fields", () => {
    expect(extractPatient("ID Paziente: 12345\nEtà: 65 anni\nSesso: M", REFERENCE_DATE)).toEqual({
      id: "12345",
      age: 65,
      sex: "M",
      birthDate: null,
    });
  });

  it("should read English labelled fields", () => {
    expect(
      extractPatient("Patient ID: MTB-2024-001\nAge: 58\nSex: Female", REFERENCE_DATE)
    ).toEqual({ id: "MTB-2024-001", age: 58, sex: "F", birthDate: null });
  });

  it("should read narrative demographics", () => {
    expect(extractPatient("Il paziente P001 maschio di 70 anni", REFERENCE_DATE)).toEqual({
      id: "P001",
      age: 70,
      sex: "M",
      birthDate: null,
    });
  });

  it("should derive age from the birth date when no age is stated", () => {
    expect(extractPatient("Data di nascita: 15/06/1958", REFERENCE_DATE)).toEqual({
      id: null,
      age: 65,
      sex: "unknown",
      birthDate: "1958-06-15",
    });
  });

  it("should ignore an out-of-range age", () => {
    expect(extractPatient("Età: 150", REFERENCE_DATE).age).toBeNull();
  });
});

// ============================================================================
// DIAGNOSIS
// ============================================================================

describe("extractDiagnosis", () => {
  it("should read diagnosis, stage and histology and map to ICD-O", () => {
    const diagnosis = extractDiagnosis(
      "Paziente affetta da adenocarcinoma polmonare stadio IVB in terapia.\nIstologia: adenocarcinoma acinare.",
      testVocabulary
    );
    expect(diagnosis).toEqual({
      primaryDiagnosis: "adenocarcinoma polmonare",
      stage: "IVB",
      histology: "adenocarcinoma acinare",
      vocabularyCode: {
        system: "ICD-O-3",
        code: "8140/3",
        display: "Adenocarcinoma, NOS",
        topography: "C34.9",
      },
    });
  });

  it("should read a labelled diagnosis line", () => {
    const diagnosis = extractDiagnosis("Diagnosi: Melanoma cutaneo\nStadio: IIIC", testVocabulary);
    expect(diagnosis.primaryDiagnosis).toBe("Melanoma cutaneo");
    expect(diagnosis.stage).toBe("IIIC");
    expect(diagnosis.vocabularyCode?.code).toBe("8720/3");
  });

  it("should keep an unmapped diagnosis with a null code", () => {
    const diagnosis = extractDiagnosis("Diagnosi: linfoma", testVocabulary);
    expect(diagnosis.primaryDiagnosis).toBe("linfoma");
    expect(diagnosis.vocabularyCode).toBeNull();
  });

  it("should return an empty record when nothing matches", () => {
    expect(extractDiagnosis("Sesso: M", testVocabulary)).toEqual({
      primaryDiagnosis: null,
      stage: null,
      histology: null,
      vocabularyCode: null,
    });
  });
});

// ============================================================================
// VARIANTS
// ============================================================================

describe("extractVariantCandidates", () => {
  it("should attach the HGNC code of the gene", () => {
    const [variant] = extractVariantCandidates(
      "│ EGFR │ c.2573T>G │ p.Leu858Arg │ Pathogenic │ 45% │",
      testVocabulary
    );
    expect(variant.geneVocabularyCode?.code).toBe("HGNC:3236");
    expect(variant.rawText).toBe("│ EGFR │ c.2573T>G │ p.Leu858Arg │ Pathogenic │ 45% │");
  });

  it("should read narrative mentions", () => {
    const variants = extractVariantCandidates("alterazione KRAS: p.G12C", testVocabulary);
    expect(variants).toHaveLength(1);
    expect(variants[0]).toMatchObject({ gene: "KRAS", proteinChange: "p.G12C", cdnaChange: null });
  });

  it("should read parenthesized changes", () => {
    const variants = extractVariantCandidates("EGFR (L858R)", testVocabulary);
    expect(variants.map((v) => v.proteinChange)).toEqual(["L858R"]);
  });

  it("should silently drop genes outside the vocabulary", () => {
    expect(extractVariantCandidates("XYZ9 L858R", testVocabulary)).toEqual([]);
  });

  it("should accept an alias and keep the reported symbol", () => {
    const [variant] = extractVariantCandidates("HER2 S310F", testVocabulary);
    expect(variant.gene).toBe("HER2");
    expect(variant.geneVocabularyCode?.symbol).toBe("ERBB2");
  });
});

describe("extractFusions", () => {
  it("should code a fusion through its first known partner", () => {
    const [variant] = extractFusions("EML4-ALK fusion", testVocabulary);
    expect(variant.gene).toBe("EML4::ALK");
    expect(variant.geneVocabularyCode?.code).toBe("HGNC:1316");
  });

  it("should accept a fusion when only one partner is known", () => {
    const [variant] = extractFusions("XYZ1::ALK", testVocabulary);
    expect(variant.gene).toBe("XYZ1::ALK");
    expect(variant.geneVocabularyCode?.symbol).toBe("ALK");
  });

  it("should drop a fusion with no known partner", () => {
    expect(extractFusions("FOO1::BAR2", testVocabulary)).toEqual([]);
  });

  it("should read single-gene rearrangements", () => {
    expect(extractFusions("ALK rearrangement", testVocabulary).map((v) => v.gene)).toEqual([
      "ALK",
    ]);
  });
});

describe("extractExonAlterations", () => {
  it("should read exon deletions", () => {
    const variants = extractExonAlterations("EGFR exon 19 deletion", testVocabulary);
    expect(variants.map((v) => v.proteinChange)).toEqual(["exon 19 deletion"]);
  });
});

describe("extractCnvs", () => {
  it("should read amplifications", () => {
    expect(extractCnvs("MET amplification", testVocabulary)).toEqual([
      {
        gene: "MET",
        cdnaChange: null,
        proteinChange: "amplification",
        classification: "Pathogenic",
        vaf: null,
        geneVocabularyCode: testVocabulary.lookupGene("MET"),
        variantType: "cnv",
        copyNumber: null,
        rawText: "MET amplification",
      },
    ]);
  });

  it("should read homozygous deletions once", () => {
    const variants = extractCnvs("CDKN2A homozygous deletion", testVocabulary);
    expect(variants.map((v) => [v.gene, v.proteinChange])).toEqual([
      ["CDKN2A", "homozygous_deletion"],
    ]);
  });

  it("should classify copy-number values", () => {
    const [variant] = extractCnvs("MET copy number: 6", testVocabulary);
    expect(variant.proteinChange).toBe("amplification");
    expect(variant.copyNumber).toBe(6);
  });

  it("should read LOH", () => {
    expect(extractCnvs("TP53 LOH", testVocabulary)[0]?.proteinChange).toBe("LOH");
  });
});

describe("extractAllVariantCandidates", () => {
  it("should not turn an exon number into a gene", () => {
    const variants = extractAllVariantCandidates("EGFR exon 19 deletion", testVocabulary);
    expect(variants.map((v) => [v.gene, v.variantType])).toEqual([["EGFR", "exon"]]);
  });

  it("should list families in priority order", () => {
    const variants = extractAllVariantCandidates(
      "MET amplification\nfusione ALK::EML4\nKRAS G12D",
      testVocabulary
    );
    expect(variants.map((v) => v.variantType)).toEqual(["point", "fusion", "fusion", "cnv"]);
  });
});

// ============================================================================
// TMB / NGS / REPORT DATE
// ============================================================================

describe("scalar fields", () => {
  it("should read TMB in mut/Mb", () => {
    expect(extractTmb("TMB: 12.5 mut/Mb")).toBe(12.5);
    expect(extractTmb("Tumor mutational burden: 7")).toBe(7);
  });

  it("should reject TMB outside (0, 1000)", () => {
    expect(extractTmb("TMB 0")).toBeNull();
    expect(extractTmb("TMB: 1500 mut/Mb")).toBeNull();
  });

  it("should read the NGS panel", () => {
    expect(extractNgsMethod("Pannello: Oncomine Focus Assay")).toBe("Oncomine Focus Assay");
    expect(extractNgsMethod("NGS:  FoundationOne   CDx")).toBe("FoundationOne CDx");
  });

  it("should read the report date as ISO", () => {
    expect(extractReportDate("Data report: 03/04/2024")).toBe("2024-04-03");
    expect(extractReportDate("Report date: 1.12.2023")).toBe("2023-12-01");
    expect(extractReportDate("nessuna data")).toBeNull();
  });
});

// ============================================================================
// THERAPEUTIC RECOMMENDATIONS
// ============================================================================

describe("extractRecommendations", () => {
  it("should map each drug once, in order of discovery", () => {
    const recommendations = extractRecommendations(
      "Si suggerisce trattamento con osimertinib 80 mg. Valutare crizotinib.",
      testVocabulary
    );
    expect(recommendations.map((r) => [r.drug, r.geneTarget, r.evidenceLevel])).toEqual([
      ["osimertinib", "EGFR", "FDA approved"],
      ["crizotinib", "ALK, ROS1, MET", "FDA approved"],
    ]);
    expect(recommendations[0].drugVocabularyCode?.code).toBe("1721560");
  });

  it("should resolve a misspelled drug after a therapy phrase", () => {
    expect(
      extractRecommendations("terapia con osimertinb", testVocabulary).map((r) => r.drug)
    ).toEqual(["osimertinib"]);
  });

  it("should leave the target empty for untargeted drugs", () => {
    const [recommendation] = extractRecommendations("pembrolizumab", testVocabulary);
    expect(recommendation.geneTarget).toBeNull();
    expect(recommendation.evidenceLevel).toBe("Unknown");
  });

  it("should drop drugs that do not map to RxNorm", () => {
    expect(extractRecommendations("terapia con aspirina", testVocabulary)).toEqual([]);
  });
});

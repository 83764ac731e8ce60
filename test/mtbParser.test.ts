/**
 * MTB REPORT PARSER - END-TO-END TEST SUITE
 *
 * Full pipeline over synthetic report texts: extraction, deduplication,
 * VAF enrichment, quality assessment and assembly.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { Effect, Schema as S } from "effect";
import { ExtractionReportSchema } from "../schemas/mtbReport";
import { defaultParserConfig } from "../schemas/parserConfig";
import { getLogLevel } from "../services/appLogger";
import {
  makeParserLayer,
  parseReport,
  parseReportSync,
  parseReports,
} from "../services/mtbParser.effect";
import { runPromise } from "../services/runtime";
import { variantIdentityKey } from "../services/variantDeduplicator";
import { VocabularyServiceFromData } from "../services/vocabulary.effect";
import { testVocabulary, testVocabularyData } from "./fixtures/vocabulary";

const REFERENCE_DATE = new Date(2024, 3, 3);

const parse = (text: string) =>
  parseReportSync(text, testVocabulary, { referenceDate: REFERENCE_DATE });

const SAMPLE_REPORT = [
  "Data report: 03/04/2024",
  "ID Paziente: 12345",
  "Data di nascita: 15/06/1958",
  "Sesso: Femmina",
  "",
  "Paziente affetta da adenocarcinoma polmonare stadio IVB in terapia.",
  "",
  "fusione ALK::EML4",
  "MET amplification",
  "TMB: 12.5 mut/Mb",
  "Pannello: Oncomine Focus Assay",
  "Istologia: adenocarcinoma acinare.",
  "Indicazione a osimertinib.",
  "EGFR c.2573T>G p.Leu858Arg Pathogenic 45%",
].join("\n");

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// CORE SCENARIOS
// ============================================================================

describe("parseReportSync - core scenarios", () => {
  it("should read a full tabular variant line as one record", () => {
    const report = parse("EGFR c.2573T>G p.Leu858Arg Pathogenic 45%");
    expect(report.variants).toHaveLength(1);
    expect(report.variants[0]).toMatchObject({
      gene: "EGFR",
      cdnaChange: "c.2573T>G",
      proteinChange: "p.Leu858Arg",
      classification: "Pathogenic",
      vaf: 45,
      variantType: "point",
    });
  });

  it("should never infer a classification", () => {
    const report = parse("KRAS G12D 8%");
    expect(report.variants).toHaveLength(1);
    expect(report.variants[0]).toMatchObject({
      gene: "KRAS",
      cdnaChange: null,
      proteinChange: "G12D",
      vaf: 8,
      classification: "unknown",
    });
  });

  it("should read a fusion once and mark it pathogenic", () => {
    const report = parse("fusione ALK::EML4");
    expect(report.variants).toHaveLength(1);
    expect(report.variants[0]).toMatchObject({
      gene: "ALK::EML4",
      proteinChange: "fusion",
      classification: "Pathogenic",
      variantType: "fusion",
      vaf: null,
    });
  });

  it("should report demographics and warn about the rest", () => {
    const report = parse("ID Paziente: 12345\nEtà: 65 anni\nSesso: M");
    expect(report.patient).toEqual({ id: "12345", age: 65, sex: "M", birthDate: null });
    expect(report.variants).toEqual([]);
    expect(report.quality.warnings).toEqual([
      "no variants extracted",
      "diagnosis not found",
      "TMB not found",
    ]);
    expect(report.quality.completenessPct).toBe(50);
  });

  it("should silently discard genes outside the vocabulary", () => {
    const report = parse("XYZ9 L858R 12%");
    expect(report.variants).toEqual([]);
    expect(report.quality.warnings).toEqual([
      "no variants extracted",
      "diagnosis not found",
      "patient information incomplete",
      "TMB not found",
    ]);
  });

  it("should return an empty report for empty text", () => {
    const report = parse("");
    expect(report.patient).toEqual({ id: null, age: null, sex: "unknown", birthDate: null });
    expect(report.variants).toEqual([]);
    expect(report.recommendations).toEqual([]);
    expect(report.quality.filledFields).toBe(0);
  });
});

// ============================================================================
// FULL REPORT
// ============================================================================

describe("parseReportSync - full report", () => {
  const report = parse(SAMPLE_REPORT);

  it("should extract patient and diagnosis", () => {
    expect(report.patient).toEqual({
      id: "12345",
      age: 65,
      sex: "F",
      birthDate: "1958-06-15",
    });
    expect(report.diagnosis.primaryDiagnosis).toBe("adenocarcinoma polmonare");
    expect(report.diagnosis.stage).toBe("IVB");
    expect(report.diagnosis.histology).toBe("adenocarcinoma acinare");
    expect(report.diagnosis.vocabularyCode?.code).toBe("8140/3");
  });

  it("should extract every variant family in priority order", () => {
    expect(report.variants.map((v) => [v.gene, v.variantType, v.vaf])).toEqual([
      ["EGFR", "point", 45],
      ["ALK::EML4", "fusion", null],
      ["MET", "cnv", null],
    ]);
  });

  it("should extract scalar fields", () => {
    expect(report.tmb).toBe(12.5);
    expect(report.ngsMethod).toBe("Oncomine Focus Assay");
    expect(report.reportDate).toBe("2024-04-03");
  });

  it("should extract recommendations", () => {
    expect(report.recommendations.map((r) => [r.drug, r.geneTarget])).toEqual([
      ["osimertinib", "EGFR"],
    ]);
  });

  it("should assess quality", () => {
    expect(report.quality.totalFieldsExpected).toBe(15);
    expect(report.quality.filledFields).toBe(13);
    expect(report.quality.completenessPct).toBe(86.7);
    expect(report.quality.warnings).toEqual(["VAF missing for 2 of 3 variants"]);
  });

  it("should satisfy the report schema", () => {
    expect(S.is(ExtractionReportSchema)(report)).toBe(true);
  });

  it("should keep variant identities unique", () => {
    const keys = report.variants.map(variantIdentityKey);
    expect(new Set(keys).size).toBe(keys.length);
  });
});

// ============================================================================
// INVARIANTS
// ============================================================================

describe("parseReportSync - invariants", () => {
  it("should be deterministic for a fixed reference date", () => {
    expect(parse(SAMPLE_REPORT)).toEqual(parse(SAMPLE_REPORT));
  });

  it("should build fresh frozen records on every call", () => {
    const first = parse(SAMPLE_REPORT);
    const second = parse(SAMPLE_REPORT);
    expect(first).not.toBe(second);
    expect(first.variants[0]).not.toBe(second.variants[0]);
    expect(Object.isFrozen(first.variants[0])).toBe(true);
  });

  it("should treat words named like object keys as plain text", () => {
    const row = parse("| EGFR | c.2573T>G | p.Leu858Arg | constructor | 45% |");
    expect(row.variants.map((v) => v.classification)).toEqual(["Constructor"]);

    const therapy = parse("KRAS G12D 8%. Treatment with constructor.");
    expect(therapy.variants.map((v) => v.gene)).toEqual(["KRAS"]);
    expect(therapy.recommendations).toEqual([]);

    const diagnosis = parse("Diagnosi: constructor\n");
    expect(diagnosis.diagnosis.primaryDiagnosis).toBe("constructor");
    expect(diagnosis.diagnosis.vocabularyCode).toBeNull();
    expect(diagnosis.quality.diagnosisMapped).toBe(false);
  });

  it("should merge short protein changes that differ only in case", () => {
    const report = parse("EGFR L858R\negfr l858r");
    expect(report.variants.map((v) => [v.gene, v.proteinChange])).toEqual([["EGFR", "L858R"]]);
  });

  it("should honor a per-call VAF window", () => {
    const text = "KRAS G12D\nallele frequency 8%";
    expect(parse(text).variants[0].vaf).toBe(8);
    const narrow = parseReportSync(text, testVocabulary, {
      referenceDate: REFERENCE_DATE,
      config: { vafWindow: 5 },
    });
    expect(narrow.variants[0].vaf).toBeNull();
  });
});

// ============================================================================
// EFFECT API & LAYERS
// ============================================================================

describe("parseReports", () => {
  it("should keep input order", async () => {
    const program = parseReports(["KRAS G12D 8%", "fusione ALK::EML4", "EGFR L858R"], {
      referenceDate: REFERENCE_DATE,
    }).pipe(Effect.provide(VocabularyServiceFromData(testVocabularyData)));

    const reports = await Effect.runPromise(program);
    expect(reports.map((r) => r.variants.map((v) => v.gene))).toEqual([
      ["KRAS"],
      ["ALK::EML4"],
      ["EGFR"],
    ]);
  });
});

describe("makeParserLayer", () => {
  it("should parse with the bundled vocabularies", async () => {
    const result = await runPromise(
      parseReport("KRAS G12D 8%").pipe(Effect.provide(makeParserLayer(defaultParserConfig)))
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.variants[0].geneVocabularyCode?.code).toBe("HGNC:6407");
    }
  });

  it("should apply its log level without changing the process-wide level", async () => {
    const debug = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const layer = makeParserLayer({ ...defaultParserConfig, logLevel: "debug" });

    await runPromise(parseReport("KRAS G12D 8%").pipe(Effect.provide(layer)));
    expect(getLogLevel()).toBe("info");
    expect(debug.mock.calls.map((call) => JSON.parse(String(call[0])).message)).toEqual([
      "variants extracted",
      "report assembled",
    ]);

    parse("KRAS G12D 8%");
    expect(debug).toHaveBeenCalledTimes(2);
  });

  it("should fail when the vocabulary directory is missing", async () => {
    const result = await runPromise(
      parseReport("KRAS G12D 8%").pipe(
        Effect.provide(
          makeParserLayer({ ...defaultParserConfig, vocabularyDir: "/nonexistent/vocabularies" })
        )
      )
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe("VocabularyLoadError");
    }
  });
});

import type { ReportContent, VariantRecord } from "../../schemas/mtbReport";
import { testVocabulary } from "./vocabulary";

export const emptyContent: ReportContent = {
  patient: { id: "12345", age: 65, sex: "M", birthDate: null },
  diagnosis: { primaryDiagnosis: null, stage: null, histology: null, vocabularyCode: null },
  variants: [],
  recommendations: [],
  tmb: null,
  ngsMethod: null,
  reportDate: null,
};

export const egfr: VariantRecord = {
  gene: "EGFR",
  cdnaChange: "c.2573T>G",
  proteinChange: "p.Leu858Arg",
  classification: "Pathogenic",
  vaf: 45,
  geneVocabularyCode: testVocabulary.lookupGene("EGFR"),
  variantType: "point",
  copyNumber: null,
  rawText: null,
};

export const completeContent: ReportContent = {
  patient: { id: "12345", age: 65, sex: "F", birthDate: "1958-06-15" },
  diagnosis: {
    primaryDiagnosis: "adenocarcinoma polmonare",
    stage: "IVB",
    histology: "adenocarcinoma acinare",
    vocabularyCode: testVocabulary.lookupDiagnosis("adenocarcinoma polmonare"),
  },
  variants: [egfr],
  recommendations: [
    {
      drug: "osimertinib",
      geneTarget: "EGFR",
      evidenceLevel: "FDA approved",
      drugVocabularyCode: testVocabulary.lookupDrug("osimertinib"),
    },
  ],
  tmb: 12.5,
  ngsMethod: null,
  reportDate: null,
};

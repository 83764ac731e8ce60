/**
 * Small in-memory vocabulary for unit tests.
 * Codes are illustrative; tests only compare them with themselves.
 */

import type { VocabularyData } from "../../schemas/vocabulary";
import { makeVocabularyService } from "../../services/vocabulary.effect";

export const testVocabularyData: VocabularyData = {
  genes: {
    EGFR: {
      code: "HGNC:3236",
      name: "epidermal growth factor receptor",
      chromosome: "7p11.2",
      actionable: true,
      aliases: ["ERBB1", "HER1"],
    },
    ERBB2: {
      code: "HGNC:3430",
      name: "erb-b2 receptor tyrosine kinase 2",
      chromosome: "17q12",
      actionable: true,
      aliases: ["HER2", "NEU"],
    },
    KRAS: { code: "HGNC:6407", name: "KRAS proto-oncogene, GTPase", actionable: true },
    BRAF: { code: "HGNC:1097", name: "B-Raf proto-oncogene", actionable: true },
    ALK: { code: "HGNC:427", name: "ALK receptor tyrosine kinase", actionable: true },
    EML4: { code: "HGNC:1316", name: "EMAP like 4", actionable: false },
    MET: { code: "HGNC:7029", name: "MET proto-oncogene", actionable: true },
    TP53: { code: "HGNC:11998", name: "tumor protein p53", actionable: false },
    CDKN2A: { code: "HGNC:1787", name: "cyclin dependent kinase inhibitor 2A", actionable: false },
    BRCA2: { code: "HGNC:1101", name: "BRCA2 DNA repair associated", actionable: true },
  },
  drugs: {
    osimertinib: {
      code: "1721560",
      display: "Osimertinib",
      targets: ["EGFR"],
      evidenceLevel: "FDA approved",
    },
    alectinib: {
      code: "1727455",
      display: "Alectinib",
      targets: ["ALK"],
      evidenceLevel: "FDA approved",
    },
    crizotinib: {
      code: "1148495",
      display: "Crizotinib",
      targets: ["ALK", "ROS1", "MET"],
      evidenceLevel: "FDA approved",
    },
    dabrafenib: {
      code: "1424911",
      display: "Dabrafenib",
      targets: ["BRAF"],
      evidenceLevel: "FDA approved",
    },
    pembrolizumab: {
      code: "1547545",
      display: "Pembrolizumab",
      targets: [],
    },
  },
  diagnoses: {
    "adenocarcinoma polmonare": {
      code: "8140/3",
      display: "Adenocarcinoma, NOS",
      topography: "C34.9",
    },
    nsclc: {
      code: "8046/3",
      display: "Non-small cell carcinoma",
      topography: "C34.9",
    },
    melanoma: {
      code: "8720/3",
      display: "Malignant melanoma, NOS",
    },
  },
};

export const testVocabulary = makeVocabularyService(testVocabularyData);

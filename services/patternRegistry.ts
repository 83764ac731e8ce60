/**
 * PATTERN REGISTRY
 *
 * Ordered, typed extraction rules for MTB report text. Every rule pairs a
 * pattern with an arity-specific builder; all rules of a family run and
 * their matches are unioned in registry order, so earlier (higher-fidelity)
 * rules win during deduplication.
 *
 * Report text mixes three shapes:
 * - Tables (box-drawing or pipe separated, or whitespace aligned rows)
 * - Inline mentions ("EGFR L858R 45%")
 * - Narrative prose ("mutazione di BRAF V600E")
 */

import type { VariantCandidate } from "../schemas/mtbReport";
import { FUSION_PROTEIN_CHANGE } from "../schemas/mtbReport";
import { normalizeClassification, normalizeGene } from "./normalizer";
import { escapeRegExp } from "./textMatching";

// ============================================================================
// RULE TYPE
// ============================================================================

export type MatchGroups = ReadonlyArray<string | undefined>;

export interface PatternRule<T> {
  readonly name: string;
  readonly pattern: RegExp; // global flag required (matchAll)
  readonly arity: number;
  readonly build: (groups: MatchGroups, rawText: string) => T | null;
}

export type VariantRule = PatternRule<VariantCandidate>;

// ============================================================================
// BUILDER HELPERS
// ============================================================================

const group = (groups: MatchGroups, index: number): string | null => {
  const value = groups[index]?.trim();
  return value === undefined || value === "" || value === "-" ? null : value;
};

const withPrefix = (prefix: "c." | "p.", value: string | null): string | null => {
  if (value === null) return null;
  return value.toLowerCase().startsWith(prefix) ? value : `${prefix}${value}`;
};

/** VAF percentage in (0, 100], else null */
export const parseVaf = (raw: string | null): number | null => {
  if (raw === null) return null;
  const value = Number.parseFloat(raw.replace(",", "."));
  return Number.isFinite(value) && value > 0 && value <= 100 ? value : null;
};

const pointVariant = (
  gene: string,
  fields: Partial<Pick<VariantCandidate, "cdnaChange" | "proteinChange" | "classification" | "vaf">>,
  rawText: string
): VariantCandidate => ({
  gene: normalizeGene(gene),
  cdnaChange: fields.cdnaChange ?? null,
  proteinChange: fields.proteinChange ?? null,
  classification: fields.classification ?? "unknown",
  vaf: fields.vaf ?? null,
  variantType: "point",
  copyNumber: null,
  rawText,
});

/** A change token goes to cdnaChange when it is "c."-prefixed, else proteinChange */
const changeFields = (change: string): Pick<VariantCandidate, "cdnaChange" | "proteinChange"> =>
  /^c\./i.test(change)
    ? { cdnaChange: change, proteinChange: null }
    : { cdnaChange: null, proteinChange: change };

const SHORT_PROTEIN_CHANGE = /^(p\.)?([A-Z]\d+[A-Z*_]+)$/i;

/** "l858r" and "p.g12c" become "L858R" and "p.G12C"; other tokens pass through */
export const normalizeShortProteinChange = (change: string): string => {
  const match = SHORT_PROTEIN_CHANGE.exec(change);
  if (!match) return change;
  return `${match[1] === undefined ? "" : "p."}${match[2].toUpperCase()}`;
};

const geneAndChange =
  (prefix: "c." | "p." | null) =>
  (groups: MatchGroups, rawText: string): VariantCandidate | null => {
    const gene = group(groups, 0);
    const change = group(groups, 1);
    if (gene === null || change === null) return null;
    const token = prefix === null ? normalizeShortProteinChange(change) : withPrefix(prefix, change);
    return token === null ? null : pointVariant(gene, changeFields(token), rawText);
  };

// ============================================================================
// VARIANT RULES (priority order)
// ============================================================================

const CLASSIFICATION_ALTERNATIVES =
  "Likely\\s+Pathogenic|Likely\\s+Benign|Pathogenic|VUS|Benign|" +
  "Probabilmente\\s+patogenetic[ao]|Probabilmente\\s+benign[ao]|Patogenetic[ao]|Benign[ao]|" +
  "Risultati\\s+discordanti";

export const VARIANT_RULES: ReadonlyArray<VariantRule> = [
  {
    // variante nell'esone 18 del gene EGFR (NM_005228.4): c.2155G>A, p.(Gly719Ser), frequenza allelica 11%
    name: "exon-detail",
    pattern:
      /variante\s+nell['’]esone\s+\d+\s+del\s+gene\s+(\w+)\s*\([^)]+\):\s*c\.([^,\s]+)(?:,\s*p\.\(([^)]+)\))?(?:,?\s*frequenza\s+allelica\s+(\d+(?:[.,]\d+)?)%)?/gi,
    arity: 4,
    build: (groups, rawText) => {
      const gene = group(groups, 0);
      if (gene === null) return null;
      return pointVariant(
        gene,
        {
          cdnaChange: withPrefix("c.", group(groups, 1)),
          proteinChange: withPrefix("p.", group(groups, 2)),
          vaf: parseVaf(group(groups, 3)),
        },
        rawText
      );
    },
  },
  {
    // │ EGFR │ c.2573T>G │ p.Leu858Arg │ Pathogenic │ 45% │   ("-" marks an empty cell)
    name: "table-row",
    pattern:
      /[│|][ \t]*([A-Z][A-Z0-9]+)[ \t]*[│|][ \t]*(c\.[^\s│|]+|-)[ \t]*[│|][ \t]*(p\.[^\s│|]+|[A-Z]\d+[A-Z*_]+|-)[ \t]*[│|][ \t]*([^│|\n]*?)[ \t]*[│|][ \t]*(\d+(?:[.,]\d+)?)[ \t]*%[ \t]*[│|]/gi,
    arity: 5,
    build: (groups, rawText) => {
      const gene = group(groups, 0);
      if (gene === null) return null;
      return pointVariant(
        gene,
        {
          cdnaChange: group(groups, 1),
          proteinChange: group(groups, 2),
          classification: normalizeClassification(group(groups, 3)),
          vaf: parseVaf(group(groups, 4)),
        },
        rawText
      );
    },
  },
  {
    // EGFR c.2573T>G p.Leu858Arg Pathogenic 45%
    name: "tabular-full",
    pattern: new RegExp(
      `(\\w+)\\s+c\\.([^\\s|│]+)\\s+p\\.([^\\s|│]+)\\s+(${CLASSIFICATION_ALTERNATIVES})\\s+(\\d+(?:[.,]\\d+)?)%`,
      "gi"
    ),
    arity: 5,
    build: (groups, rawText) => {
      const gene = group(groups, 0);
      if (gene === null) return null;
      return pointVariant(
        gene,
        {
          cdnaChange: withPrefix("c.", group(groups, 1)),
          proteinChange: withPrefix("p.", group(groups, 2)),
          classification: normalizeClassification(group(groups, 3)),
          vaf: parseVaf(group(groups, 4)),
        },
        rawText
      );
    },
  },
  {
    // EGFR c.2573T>G 45%
    name: "inline-hgvs-vaf",
    pattern: /(\w+)\s+([cp]\.[^\s,]+).*?(\d+(?:\.\d+)?)%/gi,
    arity: 3,
    build: (groups, rawText) => {
      const gene = group(groups, 0);
      const change = group(groups, 1);
      if (gene === null || change === null) return null;
      return pointVariant(
        gene,
        { ...changeFields(change), vaf: parseVaf(group(groups, 2)) },
        rawText
      );
    },
  },
  {
    // EGFR L858R, KRAS G12D
    name: "short-protein",
    pattern: /\b(\w+)\s+([A-Z]\d+[A-Z*_]+)\b/gi,
    arity: 2,
    build: geneAndChange(null),
  },
  {
    // EGFR (L858R)
    name: "parenthesized",
    pattern: /\b(\w+)\s*\(([A-Z]\d+[A-Z*]+)\)/gi,
    arity: 2,
    build: geneAndChange(null),
  },
  {
    // mutazione di BRAF V600E, alterazione KRAS: p.G12C
    name: "narrative",
    pattern:
      /(?:mutazione|alterazione)\s+(?:di\s+)?(\w+)[:\s]+((?:[cp]\.)?[A-Z]\d+[A-Z*_]+|[cp]\.[^\s,;]+)/gi,
    arity: 2,
    build: geneAndChange(null),
  },
  {
    // TP53 p.Arg273fs, BRCA1 p.Gln1756fs*74
    name: "frameshift",
    pattern: /\b(\w+)\s+p\.([A-Z][a-z]{2}\d+fs[*X]?\d*)\b/gi,
    arity: 2,
    build: geneAndChange("p."),
  },
  {
    // TP53 p.Arg213*
    name: "nonsense",
    pattern: /\b(\w+)\s+p\.([A-Z][a-z]{2}\d+\*)/gi,
    arity: 2,
    build: geneAndChange("p."),
  },
  {
    // BRCA2 c.8488-1G>A
    name: "splice",
    pattern: /\b(\w+)\s+c\.(\d+[-+]\d+[ACGT]>[ACGT])\b/gi,
    arity: 2,
    build: geneAndChange("c."),
  },
  {
    // EGFR c.2235_2249dup
    name: "duplication",
    pattern: /\b(\w+)\s+c\.(\d+_\d+dup)/gi,
    arity: 2,
    build: geneAndChange("c."),
  },
];

// ============================================================================
// FUSION RULES
// ============================================================================

const fusion = (partners: ReadonlyArray<string | null>, rawText: string): VariantCandidate | null => {
  const genes = partners.filter((p): p is string => p !== null).map(normalizeGene);
  if (genes.length === 0) return null;
  return {
    gene: genes.join("::"),
    cdnaChange: null,
    proteinChange: FUSION_PROTEIN_CHANGE,
    classification: "Pathogenic",
    vaf: null,
    variantType: "fusion",
    copyNumber: null,
    rawText,
  };
};

const twoPartners = (groups: MatchGroups, rawText: string) =>
  fusion([group(groups, 0), group(groups, 1)], rawText);

const onePartner = (groups: MatchGroups, rawText: string) =>
  fusion([group(groups, 0)], rawText);

export const FUSION_RULES: ReadonlyArray<VariantRule> = [
  { name: "fusione", pattern: /fusione\s+(\w+)\s*::\s*(\w+)/gi, arity: 2, build: twoPartners },
  { name: "riarrangiamento", pattern: /riarrangiamento\s+(\w+)[\/:]+(\w+)/gi, arity: 2, build: twoPartners },
  { name: "dash-fusion", pattern: /\b(\w+)-(\w+)\s+fusion/gi, arity: 2, build: twoPartners },
  { name: "slash-fusion", pattern: /\b(\w+)\/(\w+)\s+fusion/gi, arity: 2, build: twoPartners },
  {
    // FGFR3(17)::TACC3(11)
    name: "exon-numbered",
    pattern: /\b(\w+)\s*\(\d+\)\s*::\s*(\w+)\s*\(\d+\)/gi,
    arity: 2,
    build: twoPartners,
  },
  { name: "double-colon", pattern: /\b(\w+)::(\w+)\b/gi, arity: 2, build: twoPartners },
  {
    name: "fusion-detected",
    pattern: /\b(\w+)\s+fusion\s+(?:detected|identified|positiv[oa])/gi,
    arity: 1,
    build: onePartner,
  },
  {
    name: "rearrangement",
    pattern: /\b(\w+)\s+(?:rearrangement|riarrangiato)\b/gi,
    arity: 1,
    build: onePartner,
  },
];

// ============================================================================
// EXON ALTERATION RULES
// ============================================================================

const EXON_ALTERATIONS = new Map([
  ["insertion", "insertion"],
  ["inserzione", "insertion"],
  ["deletion", "deletion"],
  ["delezione", "deletion"],
  ["delins", "delins"],
]);

export const EXON_RULES: ReadonlyArray<VariantRule> = [
  {
    // EGFR exon 19 deletion, EGFR esone 20 inserzione
    name: "exon-alteration",
    pattern: /\b(\w+)\s+(?:esone|exon|es)\s+(\d+)\s+(insertion|inserzione|deletion|delezione|delins)\b/gi,
    arity: 3,
    build: (groups, rawText) => {
      const gene = group(groups, 0);
      const exon = group(groups, 1);
      const alteration = EXON_ALTERATIONS.get((group(groups, 2) ?? "").toLowerCase());
      if (gene === null || exon === null || alteration === undefined) return null;
      return {
        gene: normalizeGene(gene),
        cdnaChange: null,
        proteinChange: `exon ${Number.parseInt(exon, 10)} ${alteration}`,
        classification: "Pathogenic",
        vaf: null,
        variantType: "exon",
        copyNumber: null,
        rawText,
      };
    },
  },
];

// ============================================================================
// CNV RULES
// ============================================================================

const PATHOGENIC_CNV = new Set(["amplification", "deletion", "homozygous_deletion", "LOH"]);

/**
 * Subtype from a copy-number value: >= 4 amplification, <= 1 deletion.
 */
export const classifyCopyNumber = (copyNumber: number, raw: string): string => {
  if (copyNumber >= 4) return "amplification";
  if (copyNumber <= 1) return "deletion";
  return `copy_number_variation (CN=${raw})`;
};

const cnv = (
  gene: string,
  alteration: string,
  copyNumber: number | null,
  rawText: string
): VariantCandidate => ({
  gene: normalizeGene(gene),
  cdnaChange: null,
  proteinChange: alteration,
  classification: PATHOGENIC_CNV.has(alteration) ? "Pathogenic" : "VUS",
  vaf: null,
  variantType: "cnv",
  copyNumber,
  rawText,
});

const fixedCnv =
  (alteration: string) =>
  (groups: MatchGroups, rawText: string): VariantCandidate | null => {
    const gene = group(groups, 0);
    return gene === null ? null : cnv(gene, alteration, null, rawText);
  };

const copyNumberCnv = (groups: MatchGroups, rawText: string): VariantCandidate | null => {
  const gene = group(groups, 0);
  const raw = group(groups, 1);
  if (gene === null || raw === null) return null;
  const copyNumber = Number.parseFloat(raw);
  if (!Number.isFinite(copyNumber)) return null;
  return cnv(gene, classifyCopyNumber(copyNumber, raw), copyNumber, rawText);
};

export const CNV_RULES: ReadonlyArray<VariantRule> = [
  {
    name: "homozygous-deletion",
    pattern: /\b(\w+)\s+(?:homozygous|omozigotica)\s+del(?:etion|ezione)\b/gi,
    arity: 1,
    build: fixedCnv("homozygous_deletion"),
  },
  {
    name: "amplification",
    pattern: /\b(\w+)\s+(?:amplification|amplificazione|amplified|amplificato)\b/gi,
    arity: 1,
    build: fixedCnv("amplification"),
  },
  {
    name: "copy-number",
    pattern: /\b(\w+)\s+copy\s+number[:\s]+(\d+(?:\.\d+)?)/gi,
    arity: 2,
    build: copyNumberCnv,
  },
  {
    name: "cn-value",
    pattern: /\b(\w+)\s+CN\s*[:=]?\s*(\d+(?:\.\d+)?)/gi,
    arity: 2,
    build: copyNumberCnv,
  },
  {
    name: "loh",
    pattern: /\b(\w+)\s+LOH\b/gi,
    arity: 1,
    build: fixedCnv("LOH"),
  },
  {
    name: "deletion",
    pattern: /\b(\w+)\s+del(?:etion|ezione)\b/gi,
    arity: 1,
    build: fixedCnv("deletion"),
  },
];

// ============================================================================
// SCALAR FIELD PATTERNS (first match wins)
// ============================================================================

const DAY_FIRST = "(\\d{1,2}[/.\\-]\\d{1,2}[/.\\-]\\d{4})";

export const PATIENT_PATTERNS = {
  id: [
    /ID\s+Paziente[:\s]+([A-Z0-9]*\d[A-Z0-9]*)/i,
    /Patient\s+ID[:\s]+([A-Z0-9-]*\d[A-Z0-9-]*)/i,
    /Paziente\s+([A-Z]\d+)\s/i,
    /Paziente\s*:\s*([A-Z0-9]*\d[A-Z0-9]*)/i,
    /\bID[:\s]+([A-Z0-9]*\d[A-Z0-9]*)/i,
  ],
  age: [
    /\bEt[àa][:\s]+(\d{1,3})\b/i,
    /\bAge[:\s]+(\d{1,3})\b/i,
    /\b([1-9]\d{0,2})\s+anni\b/i,
    /\b([1-9]\d{0,2})\s+(?:years|yrs)\b/i,
  ],
  sex: [
    /\bSesso[:\s]+(Maschio|Femmina|Male|Female|M|F)\b/i,
    /\bSex[:\s]+(Male|Female|M|F)\b/i,
    /\bGender[:\s]+(Male|Female|M|F)\b/i,
    /\bpaziente\s+(?:[A-Z0-9]+\s+)?(maschio|femmina)\b/i,
  ],
  birthDate: [
    new RegExp(`Data\\s+di\\s+nascita[:\\s]+${DAY_FIRST}`, "i"),
    new RegExp(`Date\\s+of\\s+birth[:\\s]+${DAY_FIRST}`, "i"),
    new RegExp(`\\bDOB[:\\s]+${DAY_FIRST}`, "i"),
    new RegExp(`\\bnat[oa]\\s+il[:\\s]+${DAY_FIRST}`, "i"),
  ],
} as const;

export const DIAGNOSIS_PATTERNS: ReadonlyArray<RegExp> = [
  /affett[oa]\s+da\s+([^.\n]+?)\s+(?:stadio|stage|con|in\s+terapia|in\s+trattamento|e)\s/i,
  /affett[oa]\s+da\s+([^.\n,]+?)\s+in\s/i,
  /con\s+diagnosi\s+di\s+([^.\n]+?)\s+(?:stadio|stage|con)\s/i,
  /^[ \t]*Diagnos(?:i|is)[ \t]*:[ \t]*([^\n.(]+)/im,
  /^[ \t]*(?:Tumore|Neoplasia)[ \t]*:[ \t]*([^\n.(]+)/im,
  /affett[oa]\s+da\s+([^.\n,]+)/i,
  /\b((?:adeno)?carcinoma\s+\w+(?:\s+\w+)?)\s+stadio/i,
];

export const STAGE_PATTERN = /\b(?:stadio|stage)[:\s]+(IV|I{1,3})([ABC]?)\b/i;

export const HISTOLOGY_PATTERN = /(?:Istologia|Histology)[ \t]*:[ \t]*([^\n]+)/i;

export const TMB_PATTERNS: ReadonlyArray<RegExp> = [
  /TMB[:\s]*(\d+(?:\.\d+)?)\s*muts?\/?Mbp?/i,
  /tumou?r\s+mutational\s+burden[:\s]*(\d+(?:\.\d+)?)/i,
  /TMB[:\s]+(\d+(?:\.\d+)?)/i,
];

export const NGS_METHOD_PATTERNS: ReadonlyArray<RegExp> = [
  /Pannello[:\s]+([^\n]+)/i,
  /\bPanel[:\s]+([^\n]+)/i,
  /\bNGS[:\s]+([^\n]+)/i,
  /(?:utilizzato|used)[:\s]+([^\n]+panel)/i,
];

export const REPORT_DATE_PATTERNS: ReadonlyArray<RegExp> = [
  new RegExp(`Data\\s+report[:\\s]+${DAY_FIRST}`, "i"),
  new RegExp(`Report\\s+date[:\\s]+${DAY_FIRST}`, "i"),
  new RegExp(`\\bData[:\\s]+${DAY_FIRST}`, "i"),
];

// ============================================================================
// DRUG PATTERNS (built from the vocabulary)
// ============================================================================

/**
 * Drug mention patterns, group 1 holding the drug name.
 * Context phrases come first; the bare-name pattern catches the rest.
 */
export const buildDrugPatterns = (drugNames: ReadonlyArray<string>): ReadonlyArray<RegExp> => {
  const freeText = /\b(?:trattamento|terapia|treatment|therapy)\s+(?:con|with)\s+([A-Za-z][A-Za-z-]{3,})/gi;
  if (drugNames.length === 0) return [freeText];

  const names = drugNames.map(escapeRegExp).join("|");
  return [
    new RegExp(`(?:sensibilit[àa]|risposta|indicazione|approvato)[^.\\n]{0,50}?\\b(${names})\\b`, "gi"),
    freeText,
    new RegExp(`\\b(${names})\\b[^.\\n]{0,50}?(?:indicat[oa]|approvato|rimborsato)`, "gi"),
    new RegExp(`\\b(${names})\\b`, "gi"),
  ];
};

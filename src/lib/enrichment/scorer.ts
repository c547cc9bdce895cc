/**
 * Candidate verifier.
 *
 * Each candidate gets four independent signals (see CandidateEvidence), combined
 * by the configured weights into a score in [0, 1]. Weights are validated once
 * when the configuration is loaded, so scoring never re-checks them.
 *
 * Selection picks the highest score; ties go to the shorter domain, then the
 * lexically smaller URL. A best score at or above the acceptance threshold is
 * "verified", anything lower is "unverified" but still recorded.
 */
import { keyTokens, normalizeCompanyKey } from "@/lib/normalizer";
import type { PipelineConfig } from "@/lib/config";
import type { Candidate, CandidateEvidence, Selection } from "./types";

type ScoringConfig = Pick<
  PipelineConfig,
  "scoringWeights" | "denylistDomains" | "legalSuffixes" | "abbreviations" | "stripPrefixes"
>;

/** Second-level labels that sit under a country TLD ("acme.co.uk"). */
const GENERIC_SECOND_LEVEL = new Set(["co", "com", "org", "net", "ac", "gov", "edu", "ltd", "plc"]);

/** Lower-cased host without "www.", or null when the URL is not http(s). */
export function hostFromUrl(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
    return parsed.hostname.toLowerCase().replace(/^www\./, "") || null;
  } catch {
    return null;
  }
}

/** The label a company names its site after: "shop.acme.co.uk" -> "acme". */
export function domainLabel(host: string): string {
  const labels = host.split(".").filter(Boolean);
  if (labels.length > 1) labels.pop();
  if (labels.length > 1 && GENERIC_SECOND_LEVEL.has(labels[labels.length - 1])) labels.pop();
  return labels[labels.length - 1] ?? "";
}

function compact(text: string): string {
  return text.replace(/[^\p{L}\p{N}]/gu, "");
}

export function isDenylisted(host: string, denylist: readonly string[]): boolean {
  return denylist.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

function domainTokenMatch(nameKey: string, label: string): number {
  const labelCompact = compact(label);
  if (!labelCompact) return 0;
  if (compact(nameKey) === labelCompact) return 1;

  const tokens = keyTokens(nameKey);
  const meaningful = tokens.filter((t) => t.length >= 2);
  const counted = meaningful.length > 0 ? meaningful : tokens;
  if (counted.length === 0) return 0;
  return counted.filter((t) => labelCompact.includes(t)).length / counted.length;
}

function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function computeEvidence(
  representativeName: string,
  candidate: Pick<Candidate, "domain" | "title" | "rank" | "resultLimit" | "page">,
  config: ScoringConfig,
): CandidateEvidence {
  const nameKey = normalizeCompanyKey(representativeName, config);
  const label = domainLabel(candidate.domain);

  // Search title first, then what the page says about itself
  const titles = [
    candidate.title,
    candidate.page?.title,
    candidate.page?.description,
    ...(candidate.page?.headings ?? []),
  ];
  const inTitle =
    nameKey !== "" &&
    titles.some((text) => text !== undefined && ` ${normalizeCompanyKey(text, config)} `.includes(` ${nameKey} `));
  const inDomain = nameKey !== "" && compact(label) !== "" && compact(label).includes(compact(nameKey));
  const limit = Math.max(1, candidate.resultLimit);

  return {
    domainTokenMatch: roundScore(domainTokenMatch(nameKey, label)),
    nameInTitleOrDomain: inTitle || inDomain ? 1 : 0,
    searchRank: roundScore(Math.min(1, Math.max(0, (limit - candidate.rank) / limit))),
    notDenylisted: isDenylisted(candidate.domain, config.denylistDomains) ? 0 : 1,
  };
}

export function scoreCandidate(
  representativeName: string,
  candidate: Candidate,
  config: ScoringConfig,
): Candidate {
  const evidence = computeEvidence(representativeName, candidate, config);
  const w = config.scoringWeights;
  const score =
    w.domainTokenMatch * evidence.domainTokenMatch +
    w.nameInTitleOrDomain * evidence.nameInTitleOrDomain +
    w.searchRank * evidence.searchRank +
    w.notDenylisted * evidence.notDenylisted;

  return { ...candidate, evidence, score: roundScore(Math.min(1, Math.max(0, score))) };
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.domain.length !== b.domain.length) return a.domain.length - b.domain.length;
  if (a.url === b.url) return 0;
  return a.url < b.url ? -1 : 1;
}

export function selectBestCandidate(candidates: Candidate[], acceptanceThreshold: number): Selection {
  if (candidates.length === 0) {
    return { chosenUrl: null, confidence: 0, status: "no_candidate", best: null };
  }
  const [best] = [...candidates].sort(compareCandidates);
  return {
    chosenUrl: best.url,
    confidence: best.score,
    status: best.score >= acceptanceThreshold ? "verified" : "unverified",
    best,
  };
}

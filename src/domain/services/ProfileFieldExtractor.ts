/**
 * Profile Field Extractor
 *
 * Turns one unstructured search result (title, link, snippet, rich snippet
 * extensions) into a structured CandidateProfile using fixed keyword and
 * regex rules. No model, no network: every rule is a pure function that can
 * be tested against a literal snippet.
 *
 * Company resolution runs three independent extractors and takes the first
 * hit in priority order:
 * - Snippet ("at Acme Corp", "Acme Corp engineer")
 * - Rich snippet extensions (capitalized descriptor words)
 * - Title segments ("Jane Doe - Engineer - Acme")
 */

import {
  UNKNOWN_COMPANY,
  type CandidateProfile,
  type SearchResultRecord,
} from '../entities/Candidate.js';

// =============================================================================
// KEYWORD TABLES
// =============================================================================

const TITLE_NOISE_WORDS = ['linkedin', 'profile', 'bio', 'about', 'view', 'contact'];

// Extensions mentioning these are locations, not employers
const EXTENSION_LOCATION_WORDS = [
  'india', 'usa', 'uk', 'canada', 'california', 'texas', 'new york',
  'mumbai', 'delhi', 'bangalore', 'pune', 'hyderabad', 'chennai',
  'area', 'region', 'state', 'country',
];

const EXTENSION_TENURE_WORDS = [
  'years', 'experience', 'ago', 'months', 'intern', 'student', 'graduate',
];

const LOCATION_WORDS = [
  'india', 'usa', 'uk', 'canada', 'california', 'texas', 'new york',
  'mumbai', 'delhi', 'bangalore', 'pune', 'hyderabad', 'chennai', 'indore',
];

const ROLE_WORDS = ['intern', 'engineer', 'developer', 'analyst', 'scientist', 'manager'];

const COMPANY_STOPWORDS = ['the', 'and', 'or', 'inc', 'ltd', 'llc'];

const NAME_PATTERN = /^(.*?)\s*[-|–]/;

const AT_COMPANY_PATTERN =
  /\bat\s+([A-Z][a-zA-Z0-9\s&.,-]+?)(?:\s*[.,:;]|\s+(?:in|as|for|where|during)\s|\s*$)/i;

const COMPANY_ROLE_PATTERN =
  /([A-Z][a-zA-Z0-9\s&.,-]+?)\s+(?:researcher|scientist|engineer|developer|director|manager|analyst|intern|lead|head)/i;

// =============================================================================
// HELPERS
// =============================================================================

function containsAny(text: string, words: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return words.some((word) => lower.includes(word));
}

function wordCount(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

function acceptSnippetCandidate(raw: string): string | null {
  const candidate = raw.trim().replace(/[.,:;]+$/, '');
  if (candidate.length > 2 && wordCount(candidate) <= 4) {
    return candidate;
  }
  return null;
}

// =============================================================================
// COMPANY EXTRACTORS
// =============================================================================

export type CompanyExtractor = (record: SearchResultRecord) => string | null;

/**
 * "Jane Doe - Senior Engineer - Acme Inc": last non-noise segment after the name.
 */
export const companyFromTitle: CompanyExtractor = ({ title }) => {
  if (!title.includes(' - ')) return null;

  const segments = title.split(' - ').slice(1).reverse();
  for (const segment of segments) {
    const part = segment.trim();
    if (part.length > 2 && !containsAny(part, TITLE_NOISE_WORDS)) {
      return part;
    }
  }
  return null;
};

export const companyFromSnippet: CompanyExtractor = ({ snippet }) => {
  if (!snippet) return null;

  const atMatch = AT_COMPANY_PATTERN.exec(snippet);
  if (atMatch) {
    const company = acceptSnippetCandidate(atMatch[1]);
    if (company) return company;
  }

  const roleMatch = COMPANY_ROLE_PATTERN.exec(snippet);
  if (roleMatch) {
    return acceptSnippetCandidate(roleMatch[1]);
  }

  return null;
};

export const companyFromExtensions: CompanyExtractor = ({ richExtensions }) => {
  for (const extension of richExtensions ?? []) {
    if (containsAny(extension, EXTENSION_LOCATION_WORDS)) continue;
    if (containsAny(extension, EXTENSION_TENURE_WORDS)) continue;

    const capitalized = extension
      .split(/\s+/)
      .filter((word) => word.length > 2 && /^\p{Lu}/u.test(word));

    if (capitalized.length > 0 && capitalized.length <= 3) {
      return capitalized.join(' ');
    }
  }
  return null;
};

/**
 * Priority order: snippet > extensions > title.
 */
export const COMPANY_EXTRACTORS: readonly CompanyExtractor[] = [
  companyFromSnippet,
  companyFromExtensions,
  companyFromTitle,
];

export function cleanCompanyName(raw: string): string {
  const company = raw
    .replace(/\s*[-–]\s*LinkedIn.*$/i, '')
    .replace(/,?\s*an?\s+inc\s+\d+.*/gi, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.,:;!?]+$/, '');

  if (company.length <= 2 || COMPANY_STOPWORDS.includes(company.toLowerCase())) {
    return UNKNOWN_COMPANY;
  }
  return company;
}

export function extractCompany(record: SearchResultRecord): string {
  for (const extractor of COMPANY_EXTRACTORS) {
    const company = extractor(record);
    if (company) {
      return cleanCompanyName(company);
    }
  }
  return UNKNOWN_COMPANY;
}

// =============================================================================
// NAME, LOCATION, ROLE, EDUCATION
// =============================================================================

export function extractName(title: string): string {
  const match = NAME_PATTERN.exec(title);
  return match ? match[1].trim() : title.trim();
}

export function isLocationExtension(extension: string): boolean {
  return containsAny(extension, LOCATION_WORDS);
}

export function isRoleExtension(extension: string): boolean {
  return containsAny(extension, ROLE_WORDS);
}

/**
 * First location-looking extension and first role-looking extension.
 * An extension that reads as a location is never also taken as the role.
 */
export function extractLocationAndRole(
  extensions: readonly string[] = []
): { location: string; currentRole: string } {
  let location = '';
  let currentRole = '';

  for (const extension of extensions) {
    if (isLocationExtension(extension)) {
      if (!location) location = extension;
    } else if (isRoleExtension(extension)) {
      if (!currentRole) currentRole = extension;
    }
  }

  return { location, currentRole };
}

export interface EducationRule {
  keywords: readonly string[];
  label: string;
}

export const EDUCATION_RULES: readonly EducationRule[] = [
  { keywords: ['b.tech', 'bachelor'], label: 'B.Tech Computer Science' },
  { keywords: ['m.tech', 'master'], label: "Master's degree" },
  { keywords: ['phd', 'ph.d'], label: 'PhD' },
  { keywords: ['student'], label: 'Student' },
];

export function extractEducation(snippet: string): string {
  const rule = EDUCATION_RULES.find((r) => containsAny(snippet, r.keywords));
  return rule ? rule.label : '';
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export function extractProfile(record: SearchResultRecord): CandidateProfile {
  const title = record.title ?? '';
  const snippet = record.snippet ?? '';
  const normalized: SearchResultRecord = {
    title,
    link: record.link ?? '',
    snippet,
    richExtensions: record.richExtensions ?? [],
  };

  const { location, currentRole } = extractLocationAndRole(normalized.richExtensions);

  return Object.freeze({
    name: extractName(title),
    headline: title,
    company: extractCompany(normalized),
    location,
    linkedinUrl: normalized.link,
    snippet,
    education: extractEducation(snippet),
    currentRole,
  });
}

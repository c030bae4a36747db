// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE RELIABILITY — Domain Tier Classification
// ═══════════════════════════════════════════════════════════════════════════════
//
// Domain patterns live in data/reliability-domains.json at the package root,
// which sits at the same depth from src/ and dist/.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// TABLE
// ─────────────────────────────────────────────────────────────────────────────────

export const ReliabilityTierSchema = z.enum([
  'official',
  'wire',
  'factcheck',
  'authoritative',
  'reference',
  'questionable',
  'community',
]);

export type ReliabilityTier = z.infer<typeof ReliabilityTierSchema>;

const ReliabilityTableSchema = z.object({
  tiers: z.record(ReliabilityTierSchema, z.array(z.string().min(1))),
  trustedTiers: z.array(ReliabilityTierSchema),
});

export type ReliabilityTable = z.infer<typeof ReliabilityTableSchema>;

const TABLE_URL = new URL('../../../data/reliability-domains.json', import.meta.url);

let table: ReliabilityTable | null = null;

export function getReliabilityTable(): ReliabilityTable {
  if (!table) {
    table = ReliabilityTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, 'utf8')));
  }
  return table;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Host of a URL, or the lowercased input when it is not a URL
 * (e.g. a bare domain or a label such as "Wikipedia").
 */
export function sourceDomain(source: string): string {
  try {
    return new URL(source).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return source.trim().toLowerCase();
  }
}

function matchesTier(domain: string, tier: ReliabilityTier): boolean {
  const patterns = getReliabilityTable().tiers[tier] ?? [];
  return patterns.some((pattern) => domain.includes(pattern));
}

/**
 * First tier whose patterns match the source's domain; `community` otherwise.
 */
export function getReliabilityTier(source: string): ReliabilityTier {
  const domain = sourceDomain(source);
  for (const tier of ReliabilityTierSchema.options) {
    if (matchesTier(domain, tier)) {
      return tier;
    }
  }
  return 'community';
}

export function isTrustedSource(source: string): boolean {
  const domain = sourceDomain(source);
  return getReliabilityTable().trustedTiers.some((tier) => matchesTier(domain, tier));
}

export function isQuestionableSource(source: string): boolean {
  return matchesTier(sourceDomain(source), 'questionable');
}

import { randomBytes } from 'node:crypto';

export function randomHex(bytes = 12): string {
  return randomBytes(bytes).toString('hex');
}

export function slugify(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .replace(/-{2,}/g, '-')
    .slice(0, 40);
}

export function generateNegotiationId(): string {
  return `neg_${randomHex(8)}`;
}

export function generateOfferId(negotiationId: string, version: number): string {
  return `${negotiationId}_offer_${version}`;
}

export function generateRoundId(negotiationId: string, roundNumber: number): string {
  return `${negotiationId}_round_${roundNumber}`;
}

export function generateCatalogId(prefix: 'veh' | 'cli', label: string): string {
  const slug = slugify(label) || prefix;
  return `${prefix}_${slug}_${randomHex(3)}`;
}

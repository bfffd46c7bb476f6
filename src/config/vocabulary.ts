/** Controlled vocabularies the router must choose from. */

export const SOURCE_TYPES = [
  'Coaching blogs',
  'training websites',
  'expert-authored pages',
  'E-commerce sites',
  'product review sites',
  'affiliate blogs',
  'Instructional platforms',
  'fitness apps',
  'YouTube channels',
  'Knowledge bases',
  'encyclopedias',
  'government or academic sources',
  'financial data APIs',
  'bank product pages',
  'personal finance editorial sites',
] as const;

export const MODALITY_TYPES = [
  'Long-form text',
  'structured schedules',
  'tables',
  'Listicles',
  'bullet lists',
  'product comparison tables',
  'Video (with transcripts)',
  'step-by-step guides',
  'Concise explanatory text',
  'structured definitions',
] as const;

export const UNKNOWN_LABEL = 'unknown';

/** Case-insensitive lookup returning the vocabulary's own spelling. */
export function canonicalize(value: string, vocabulary: ReadonlyArray<string>): string | undefined {
  const needle = value.trim().toLowerCase();
  return vocabulary.find((entry) => entry.toLowerCase() === needle);
}

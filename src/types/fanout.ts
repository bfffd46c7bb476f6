/**
 * Records passed between the fan-out stages. Field names are the persisted
 * JSON shape and the shape requested from the model, hence snake_case.
 */

export interface IdentifiedSlots {
  explicit: Record<string, string>;
  implicit: Record<string, string>;
}

export interface ExpansionResult {
  original_query: string;
  classified_intent: string;
  domain: string;
  subdomain: string;
  risk_profile: string;
  identified_slots: IdentifiedSlots;
  projected_latent_intents: string[];
  rewrites_and_diversifications: string[];
  speculative_sub_questions: string[];
  error?: string;
}

export interface IdealContentProfile {
  extractability: string;
  evidence_density: string;
  scope_clarity: string;
  authority_signals: string;
  freshness: string;
  target_keywords_and_phrasings: string[];
}

export interface ErrorProfile {
  error: string;
}

export type ContentProfile = IdealContentProfile | ErrorProfile;

export interface RoutedSubQuery {
  sub_query: string;
  predicted_source_types: string[];
  predicted_modality: string;
  error?: string;
  ideal_content_profile?: ContentProfile;
}

export interface FanOutRunRecord {
  run_id: string;
  started_at: string;
  original_query: string;
  location: string | null;
  expansion: ExpansionResult;
  routed_and_profiled: RoutedSubQuery[];
}

export const PROFILE_TEXT_FIELDS = [
  'extractability',
  'evidence_density',
  'scope_clarity',
  'authority_signals',
  'freshness',
] as const satisfies ReadonlyArray<keyof IdealContentProfile>;

export type ProfileTextField = (typeof PROFILE_TEXT_FIELDS)[number];

export function isErrorProfile(profile: ContentProfile | undefined): profile is ErrorProfile {
  return profile !== undefined && 'error' in profile;
}

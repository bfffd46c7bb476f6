// src/services/content-plan.ts: cluster briefs and the human-readable content plan
import {
  PROFILE_TEXT_FIELDS,
  isErrorProfile,
  type FanOutRunRecord,
  type IdealContentProfile,
  type ProfileTextField,
  type RoutedSubQuery,
} from '../types/fanout';
import { DEFAULT_CLUSTER_CONFIG, clusterProfiles, toClusters, type ClusterConfig } from './content-clustering';

const FIELD_TITLES: Record<ProfileTextField, string> = {
  extractability: 'Extractability',
  evidence_density: 'Evidence Density',
  scope_clarity: 'Scope Clarity',
  authority_signals: 'Authority Signals',
  freshness: 'Freshness',
};

const PLACEHOLDER = 'N/A';

export interface ClusterBrief {
  name: string;
  subQueries: string[];
  fields: Record<ProfileTextField, string[]>;
  keywords: string[];
  gaps: Array<{ subQuery: string; reason: string }>;
}

function profiled(member: RoutedSubQuery): IdealContentProfile | undefined {
  const profile = member.ideal_content_profile;
  if (!profile || isErrorProfile(profile)) return undefined;
  return profile;
}

/**
 * Aggregates every member's profile: each free-text field is the union of the
 * members' values, keywords are unique within the cluster (case-insensitive,
 * first spelling kept).
 */
export function aggregateCluster(name: string, members: readonly RoutedSubQuery[]): ClusterBrief {
  const fields: Record<ProfileTextField, string[]> = {
    extractability: [],
    evidence_density: [],
    scope_clarity: [],
    authority_signals: [],
    freshness: [],
  };
  const keywords: string[] = [];
  const seenKeywords = new Set<string>();
  const gaps: ClusterBrief['gaps'] = [];

  for (const member of members) {
    const profile = profiled(member);
    if (!profile) {
      const raw = member.ideal_content_profile;
      gaps.push({
        subQuery: member.sub_query,
        reason: raw && isErrorProfile(raw) ? raw.error : 'not profiled',
      });
      continue;
    }

    for (const field of PROFILE_TEXT_FIELDS) {
      const value = profile[field].trim();
      if (value && value !== PLACEHOLDER && !fields[field].includes(value)) fields[field].push(value);
    }
    for (const keyword of profile.target_keywords_and_phrasings) {
      const key = keyword.trim().toLowerCase();
      if (!key || seenKeywords.has(key)) continue;
      seenKeywords.add(key);
      keywords.push(keyword.trim());
    }
  }

  return { name, subQueries: members.map((m) => m.sub_query), fields, keywords, gaps };
}

function bulletList(items: string[], empty: string): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : [`- ${empty}`];
}

/** Markdown brief for one cluster. */
export function synthesizeBrief(name: string, members: readonly RoutedSubQuery[]): string {
  const brief = aggregateCluster(name, members);
  const lines: string[] = [`## ${brief.name}`, '', '### Sub-queries covered', ...bulletList(brief.subQueries, 'none'), ''];

  lines.push('### Aggregated content profile');
  for (const field of PROFILE_TEXT_FIELDS) {
    lines.push('', `**${FIELD_TITLES[field]}**`, ...bulletList(brief.fields[field], 'no data'));
  }

  lines.push('', '### Target keywords and phrasings', ...bulletList(brief.keywords, 'no data'));

  if (brief.gaps.length > 0) {
    lines.push('', '### Profiling gaps', ...brief.gaps.map((g) => `- ${g.subQuery}: ${g.reason}`));
  }

  return lines.join('\n');
}

export function generateContentPlan(
  record: Pick<FanOutRunRecord, 'original_query' | 'location' | 'routed_and_profiled' | 'expansion'>,
  config: ClusterConfig = DEFAULT_CLUSTER_CONFIG,
): string {
  const clusters = toClusters(clusterProfiles(record.routed_and_profiled, config));
  const header = [
    `# Content Plan for "${record.original_query}"`,
    '',
    `- **Location:** ${record.location ?? 'Global'}`,
    `- **Intent:** ${record.expansion.classified_intent} (${record.expansion.domain} / ${record.expansion.subdomain})`,
    `- **Sub-queries:** ${record.routed_and_profiled.length} in ${clusters.length} clusters`,
  ];
  if (record.expansion.error) header.push(`- **Expansion error:** ${record.expansion.error}`);

  if (clusters.length === 0) {
    return [...header, '', 'No sub-queries were produced for this query.', ''].join('\n');
  }

  return [...header, '', ...clusters.map((c) => `${synthesizeBrief(c.name, c.members)}\n`)].join('\n');
}

// src/services/content-clustering.ts: thematic grouping of profiled sub-queries
import clusterDefinitions from '../data/cluster-definitions.json';
import type { RoutedSubQuery } from '../types/fanout';

export interface ClusterDefinition {
  name: string;
  keywords: string[];
}

export interface ClusterConfig {
  /** Tried in order; more specific themes must come first. */
  clusters: ClusterDefinition[];
  catchAll: string;
}

export interface Cluster {
  name: string;
  members: RoutedSubQuery[];
}

export const DEFAULT_CLUSTER_CONFIG: ClusterConfig = clusterDefinitions;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

type CompiledCluster = { name: string; patterns: RegExp[] };

function compile(config: ClusterConfig): CompiledCluster[] {
  return config.clusters.map((cluster) => ({
    name: cluster.name,
    patterns: cluster.keywords.map((kw) => new RegExp(`\\b${escapeRegExp(kw.trim())}\\b`, 'i')),
  }));
}

/** First matching cluster name for `text`, else the catch-all. */
export function assignCluster(text: string, config: ClusterConfig = DEFAULT_CLUSTER_CONFIG): string {
  return matchCompiled(text, compile(config)) ?? config.catchAll;
}

function matchCompiled(text: string, compiled: CompiledCluster[]): string | undefined {
  return compiled.find((cluster) => cluster.patterns.some((re) => re.test(text)))?.name;
}

/**
 * Single-pass assignment of every profile to exactly one cluster. Keys follow
 * definition order with the catch-all last; empty clusters are left out.
 */
export function clusterProfiles(
  profiles: readonly RoutedSubQuery[],
  config: ClusterConfig = DEFAULT_CLUSTER_CONFIG,
): Map<string, RoutedSubQuery[]> {
  const compiled = compile(config);
  const buckets = new Map<string, RoutedSubQuery[]>();
  for (const cluster of config.clusters) buckets.set(cluster.name, []);
  if (!buckets.has(config.catchAll)) buckets.set(config.catchAll, []);

  for (const profile of profiles) {
    const name = matchCompiled(profile.sub_query, compiled) ?? config.catchAll;
    buckets.get(name)?.push(profile);
  }

  // catch-all goes last even if a definition shares its name
  const ordered = new Map<string, RoutedSubQuery[]>();
  for (const [name, members] of buckets) {
    if (name !== config.catchAll && members.length > 0) ordered.set(name, members);
  }
  const rest = buckets.get(config.catchAll) ?? [];
  if (rest.length > 0) ordered.set(config.catchAll, rest);
  return ordered;
}

export function toClusters(grouped: Map<string, RoutedSubQuery[]>): Cluster[] {
  return [...grouped].map(([name, members]) => ({ name, members }));
}

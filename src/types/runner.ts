/**
 * Monitor run type definitions
 */

import type { PatternRegistry } from "./patterns";
import type { MonitorConfig } from "./config";
import type { StoreStats } from "./db";
import type { DocumentSource } from "@/interfaces/documentSource";
import type { DigestSink } from "@/interfaces/digestSink";

/**
 * Collaborators of a monitor run. Injected so tests can substitute
 * the source, the sink and the clock.
 */
export type MonitorDeps = {
  source: DocumentSource;
  sink: DigestSink;
  registry: PatternRegistry;
  config: Pick<MonitorConfig, "relevanceThreshold" | "digestType" | "cleanupDays">;
  /** Clock, defaults to () => new Date() */
  now?: () => Date;
};

/**
 * Counters reported at the end of a run.
 */
export type MonitorRunSummary = {
  /** Documents returned by the source */
  fetched: number;
  /** Documents not seen before (by URL) */
  newDocuments: number;
  accepted: number;
  rejected: number;
  /** Announcements delivered in this run's digest (0 when none sent) */
  digested: number;
  /** Articles removed by retention cleanup */
  cleanedUp: number;
  stats: StoreStats;
};

/**
 * Canonical artifact names inside a database directory
 */

import { basename, join } from "path";

export const ARTIFACTS = {
  manifest: "library-files.txt",
  rawTable: "database.jdb",
  reducedTable: "database.jdb.small",
  reducedBackup: "database.jdb.big",
  shardPrefix: "database",
  sortedTable: "database0.kdb",
  index: "database.idx",
  taxonMap: "seqid2taxid.map",
  taxonMapOriginal: "seqid2taxid.map.orig",
  augmentedTaxonMap: "seqid2taxid-plus.map",
  taxDB: "taxDB",
  lcaDatabase: "database.kdb",
  lcaKmerCounts: "database.kmer_count",
  uidDatabase: "uid_database.kdb",
  uidKmerCounts: "uid_database.kmer_count",
  uidMap: "uid_to_taxid.map",
  uidComplete: "uid_database.complete",
} as const;

export type ArtifactName = keyof typeof ARTIFACTS;

/**
 * Resolves artifact names to absolute paths for one database directory
 */
export class ArtifactPaths {
  /** Base name used for report and classification output files */
  readonly base: string;

  constructor(readonly databaseDir: string) {
    this.base = basename(databaseDir);
  }

  path(name: ArtifactName): string {
    return join(this.databaseDir, ARTIFACTS[name]);
  }

  /** Shard file written by the counting engine */
  shard(index: number): string {
    return join(this.databaseDir, `${ARTIFACTS.shardPrefix}_${index}`);
  }

  get lcaReport(): string {
    return join(this.databaseDir, `${this.base}.report`);
  }

  get lcaClassifications(): string {
    return join(this.databaseDir, `${this.base}.kraken`);
  }

  get uidReport(): string {
    return join(this.databaseDir, `${this.base}.uid_report`);
  }

  get uidClassifications(): string {
    return join(this.databaseDir, `${this.base}.uid_kraken`);
  }
}

/** Counting-engine shard names: `database_0`, `database_1`, ... */
export const SHARD_PATTERN = /^database_(\d+)$/;

/**
 * Whether a directory entry is deleted by the rebuild directive
 *
 * Covers `database.*`, `*.map`, `lca.complete`, `library-files.txt`,
 * `uid_database.*` and `taxDB`, plus the sorted table, counting shards and
 * the report outputs, so that no stage can be skipped afterwards.
 */
export function isRebuildTarget(entry: string, base: string): boolean {
  return (
    entry.startsWith("database.") ||
    entry.startsWith(ARTIFACTS.sortedTable) ||
    SHARD_PATTERN.test(entry) ||
    entry.endsWith(".map") ||
    entry.startsWith("uid_database.") ||
    entry === "lca.complete" ||
    entry === ARTIFACTS.manifest ||
    entry.startsWith(ARTIFACTS.taxDB) ||
    entry.startsWith(`${base}.report`) ||
    entry.startsWith(`${base}.kraken`) ||
    entry.startsWith(`${base}.uid_report`) ||
    entry.startsWith(`${base}.uid_kraken`)
  );
}

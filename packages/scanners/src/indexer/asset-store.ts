import type { AssetRecord } from "@assetlens/core";

/**
 * The indexer's only mutation point. Keeps the path-keyed primary map and
 * the category and type projections consistent with each other.
 */
export interface AssetStore {
  get(relativePath: string): AssetRecord | undefined;
  has(relativePath: string): boolean;
  all(): AssetRecord[];
  byCategory(category: string): AssetRecord[];
  byType(assetType: string): AssetRecord[];
  categories(): string[];
  types(): string[];
  readonly size: number;

  /**
   * Insert or overwrite; an overwritten record leaves its old groups. The
   * store keeps a frozen copy, so later changes to `record` do not reach it.
   */
  put(record: AssetRecord): void;
  /** Returns whether a record was removed */
  delete(relativePath: string): boolean;
  /** Swap the whole contents in one step */
  replaceAll(records: Iterable<AssetRecord>): void;
  clear(): void;
}

export class InMemoryAssetStore implements AssetStore {
  private byPath = new Map<string, AssetRecord>();
  private categoryIndex = new Map<string, Set<string>>();
  private typeIndex = new Map<string, Set<string>>();

  get size(): number {
    return this.byPath.size;
  }

  get(relativePath: string): AssetRecord | undefined {
    return this.byPath.get(relativePath);
  }

  has(relativePath: string): boolean {
    return this.byPath.has(relativePath);
  }

  all(): AssetRecord[] {
    return [...this.byPath.values()];
  }

  byCategory(category: string): AssetRecord[] {
    return this.resolve(this.categoryIndex.get(category));
  }

  byType(assetType: string): AssetRecord[] {
    return this.resolve(this.typeIndex.get(assetType));
  }

  categories(): string[] {
    return [...this.categoryIndex.keys()].sort();
  }

  types(): string[] {
    return [...this.typeIndex.keys()].sort();
  }

  put(input: AssetRecord): void {
    const record = freezeRecord(input);
    this.unlink(record.relativePath);
    this.byPath.set(record.relativePath, record);
    addToGroup(this.categoryIndex, record.category, record.relativePath);
    addToGroup(this.typeIndex, record.assetType, record.relativePath);
  }

  delete(relativePath: string): boolean {
    if (!this.byPath.has(relativePath)) return false;
    this.unlink(relativePath);
    this.byPath.delete(relativePath);
    return true;
  }

  replaceAll(records: Iterable<AssetRecord>): void {
    this.clear();
    for (const record of records) {
      this.put(record);
    }
  }

  clear(): void {
    this.byPath.clear();
    this.categoryIndex.clear();
    this.typeIndex.clear();
  }

  private unlink(relativePath: string): void {
    const existing = this.byPath.get(relativePath);
    if (!existing) return;
    removeFromGroup(this.categoryIndex, existing.category, relativePath);
    removeFromGroup(this.typeIndex, existing.assetType, relativePath);
  }

  private resolve(paths: Set<string> | undefined): AssetRecord[] {
    if (!paths) return [];
    const records: AssetRecord[] = [];
    for (const path of paths) {
      const record = this.byPath.get(path);
      if (record) records.push(record);
    }
    return records;
  }
}

// Group projections are keyed by category and type, so stored records must not change
function freezeRecord(record: AssetRecord): AssetRecord {
  const dependencies = [...record.dependencies];
  const issues = [...record.issues];
  const warnings = [...record.warnings];
  const metadata = { ...record.metadata };
  Object.freeze(dependencies);
  Object.freeze(issues);
  Object.freeze(warnings);
  Object.freeze(metadata);

  const frozen: AssetRecord = { ...record, metadata, dependencies, issues, warnings };
  Object.freeze(frozen);
  return frozen;
}

function addToGroup(index: Map<string, Set<string>>, key: string, path: string): void {
  let group = index.get(key);
  if (!group) {
    group = new Set();
    index.set(key, group);
  }
  group.add(path);
}

function removeFromGroup(index: Map<string, Set<string>>, key: string, path: string): void {
  const group = index.get(key);
  if (!group) return;
  group.delete(path);
  // Empty groups would otherwise linger in categories()/types()
  if (group.size === 0) index.delete(key);
}

// Evidence Store: append-only, content-addressed repository of immutable Evidence.
//
// The store is an arena: a map from id to the canonical JSON of the record, plus
// a parent → children index. Parent pointers are the only graph edges, so the
// lineage graph is a forest of chains. The public surface has no update and no
// delete; persistence backends only ever add records.
//
// Identity: id = sha256(canonical({ version_kind, parent_id, payload })).
// created_at and producer are audit metadata outside the address, so the same
// content submitted twice converges to one record.

import { checkDraft, parseEvidenceRecord } from "./evidence-schema.js";
import { IntegrityError, NotFoundError } from "./errors.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import {
  VERSION_ORDER,
  type Evidence,
  type EvidenceDraftOf,
  type EvidenceOf,
  type VersionKind,
} from "./types.js";
import { canonicalJson, contentHash, deepFreeze } from "./utils.js";

// ─── Lineage rules ──────────────────────────────────────────────────────────────

export function versionRank(kind: VersionKind): number {
  return VERSION_ORDER.indexOf(kind);
}

/** The kind a child of `kind` must have, or null when `kind` is terminal. */
export function nextVersionKind(kind: VersionKind): VersionKind | null {
  return VERSION_ORDER[versionRank(kind) + 1] ?? null;
}

export function isEvidenceKind<K extends VersionKind>(
  evidence: Evidence,
  kind: K,
): evidence is EvidenceOf<K> {
  return evidence.version_kind === kind;
}

/** Compute the content address of a draft (or of a stored record's content). */
export function computeEvidenceId(content: {
  version_kind: VersionKind;
  parent_id: string | null;
  payload: unknown;
}): string {
  return contentHash({
    version_kind: content.version_kind,
    parent_id: content.parent_id,
    payload: content.payload,
  });
}

// ─── Persistence backend contract ───────────────────────────────────────────────

export type PersistOutcome = "written" | "exists";

/**
 * Where committed records live. A backend never rewrites an existing record:
 * `persist` for an id that is already stored must leave it untouched and
 * report "exists".
 */
export interface EvidenceBackend {
  readonly name: string;
  loadAll(): Promise<unknown[]>;
  persist(id: string, record: Evidence): Promise<PersistOutcome>;
}

/** Keeps nothing outside the store's own arena. Default for tests and one-shot runs. */
export class InMemoryEvidenceBackend implements EvidenceBackend {
  readonly name = "memory";

  async loadAll(): Promise<unknown[]> {
    return [];
  }

  async persist(): Promise<PersistOutcome> {
    return "written";
  }
}

// ─── Store ──────────────────────────────────────────────────────────────────────

export interface EvidenceStoreOptions {
  backend?: EvidenceBackend;
  logger?: PipelineLogger;
  /** Clock used for created_at. Injectable for deterministic tests. */
  now?: () => Date;
}

export interface VerificationIssue {
  id: string;
  problem: string;
}

/** Read-only view handed to stages and the HTTP surface. */
export interface EvidenceReader {
  get(id: string): Promise<Evidence>;
  getAs<K extends VersionKind>(id: string, kind: K): Promise<EvidenceOf<K>>;
  has(id: string): Promise<boolean>;
  children(id: string): Promise<Evidence[]>;
  lineage(id: string): Promise<Evidence[]>;
}

export class EvidenceStore implements EvidenceReader {
  private readonly records = new Map<string, string>();
  private readonly childIndex = new Map<string, string[]>();
  private readonly pending = new Map<string, Promise<string>>();
  private readonly backend: EvidenceBackend;
  private readonly logger: PipelineLogger;
  private readonly now: () => Date;

  constructor(options: EvidenceStoreOptions = {}) {
    this.backend = options.backend ?? new InMemoryEvidenceBackend();
    this.logger = options.logger ?? createLogger("EvidenceStore");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open a store over a backend that may already hold records.
   * Every record is schema-checked, re-hashed and lineage-checked before it is
   * admitted; any failure aborts with IntegrityError.
   */
  static async open(options: EvidenceStoreOptions = {}): Promise<EvidenceStore> {
    const store = new EvidenceStore(options);
    const raw = await store.backend.loadAll();

    const parsed: Evidence[] = [];
    for (const value of raw) {
      const result = parseEvidenceRecord(value);
      if (!result.ok) {
        throw new IntegrityError(`Persisted evidence failed schema validation: ${result.issues.join("; ")}`, {
          stage: "store",
          evidenceId: null,
        });
      }
      parsed.push(result.evidence);
    }

    // Parents before children: kind rank first, then commit order.
    parsed.sort(
      (a, b) =>
        versionRank(a.version_kind) - versionRank(b.version_kind) ||
        a.created_at.localeCompare(b.created_at) ||
        a.id.localeCompare(b.id),
    );

    for (const evidence of parsed) {
      const expectedId = computeEvidenceId(evidence);
      if (expectedId !== evidence.id) {
        throw new IntegrityError(`Content hash mismatch: stored id ${evidence.id}, content hashes to ${expectedId}`, {
          stage: "store",
          evidenceId: evidence.id,
        });
      }
      store.assertLineage(evidence.id, evidence.version_kind, evidence.parent_id);
      store.admit(evidence);
    }

    store.logger.info(`Opened ${store.backend.name} store with ${parsed.length} evidence record(s)`);
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Commit a draft and return its id. Idempotent: identical content (kind,
   * parent, payload) returns the existing id without writing. Concurrent puts
   * of the same content share one in-flight write.
   *
   * @throws IntegrityError on a lineage violation or a payload that does not
   *         match the schema for its kind.
   */
  async put<K extends VersionKind>(draft: EvidenceDraftOf<K>): Promise<string> {
    const schema = checkDraft(draft);
    if (!schema.ok) {
      throw new IntegrityError(`Invalid ${draft.version_kind} payload: ${schema.issues.join("; ")}`, {
        stage: "store",
        evidenceId: draft.parent_id,
      });
    }

    // Snapshot through JSON so later mutation of the caller's object cannot reach the store.
    const payload: unknown = JSON.parse(canonicalJson(draft.payload));
    const id = computeEvidenceId({ version_kind: draft.version_kind, parent_id: draft.parent_id, payload });

    if (this.records.has(id)) {
      this.logger.info(`Deduplicated ${draft.version_kind} evidence ${id}`);
      return id;
    }
    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }

    this.assertLineage(id, draft.version_kind, draft.parent_id);

    const commit = this.commit(id, draft.version_kind, draft.parent_id, draft.producer, payload);
    this.pending.set(id, commit);
    try {
      return await commit;
    } finally {
      this.pending.delete(id);
    }
  }

  /** Commit a draft and return the stored (frozen) record. */
  async putAndGet<K extends VersionKind>(draft: EvidenceDraftOf<K>): Promise<EvidenceOf<K>> {
    const id = await this.put(draft);
    return this.getAs(id, draft.version_kind);
  }

  /** @throws NotFoundError for unknown ids. */
  async get(id: string): Promise<Evidence> {
    return this.read(id);
  }

  /**
   * Fetch an id that must hold a specific version kind.
   * @throws NotFoundError when the id is unknown or holds another kind.
   */
  async getAs<K extends VersionKind>(id: string, kind: K): Promise<EvidenceOf<K>> {
    const evidence = this.read(id);
    if (!isEvidenceKind(evidence, kind)) {
      throw new NotFoundError(
        `Evidence ${id} is ${evidence.version_kind}, expected ${kind}`,
        { stage: "store", evidenceId: id },
        { expected: kind, actual: evidence.version_kind },
      );
    }
    return evidence;
  }

  async has(id: string): Promise<boolean> {
    return this.records.has(id);
  }

  /** Direct children, ordered by created_at then id. */
  async children(id: string): Promise<Evidence[]> {
    this.read(id);
    return (this.childIndex.get(id) ?? [])
      .map((childId) => this.read(childId))
      .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id));
  }

  /** The chain from the Raw root down to `id`, inclusive. */
  async lineage(id: string): Promise<Evidence[]> {
    const chain: Evidence[] = [];
    let current: string | null = id;
    while (current !== null) {
      const evidence = this.read(current);
      chain.push(evidence);
      current = evidence.parent_id;
    }
    return chain.reverse();
  }

  /** All records, parents before children. */
  async list(): Promise<Evidence[]> {
    return [...this.records.keys()].map((id) => this.read(id));
  }

  /**
   * Recompute every id from content and re-check every lineage edge.
   * Returns the problems found; an empty list means the store is consistent.
   */
  async verify(): Promise<VerificationIssue[]> {
    const issues: VerificationIssue[] = [];
    for (const [id, serialized] of this.records) {
      const result = parseEvidenceRecord(JSON.parse(serialized));
      if (!result.ok) {
        issues.push({ id, problem: `schema: ${result.issues.join("; ")}` });
        continue;
      }
      const evidence = result.evidence;
      const recomputed = computeEvidenceId(evidence);
      if (recomputed !== id) {
        issues.push({ id, problem: `content hashes to ${recomputed}` });
      }
      if (evidence.parent_id !== null) {
        const parentSerialized = this.records.get(evidence.parent_id);
        if (!parentSerialized) {
          issues.push({ id, problem: `parent ${evidence.parent_id} is missing` });
          continue;
        }
        const parent = parseEvidenceRecord(JSON.parse(parentSerialized));
        if (parent.ok && nextVersionKind(parent.evidence.version_kind) !== evidence.version_kind) {
          issues.push({
            id,
            problem: `${evidence.version_kind} cannot follow ${parent.evidence.version_kind}`,
          });
        }
      } else if (evidence.version_kind !== "Raw") {
        issues.push({ id, problem: `${evidence.version_kind} evidence has no parent` });
      }
    }
    return issues;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async commit(
    id: string,
    kind: VersionKind,
    parentId: string | null,
    producer: string,
    payload: unknown,
  ): Promise<string> {
    const candidate = {
      id,
      version_kind: kind,
      parent_id: parentId,
      created_at: this.now().toISOString(),
      producer,
      payload,
    };
    const parsed = parseEvidenceRecord(candidate);
    if (!parsed.ok) {
      throw new IntegrityError(`Evidence envelope invalid: ${parsed.issues.join("; ")}`, {
        stage: "store",
        evidenceId: id,
      });
    }

    const outcome = await this.backend.persist(id, parsed.evidence);
    if (outcome === "exists") {
      this.logger.warn(`Backend already held ${id}; keeping the persisted record`);
    }
    // A parallel put may have admitted the id while the backend wrote.
    if (!this.records.has(id)) {
      this.admit(parsed.evidence);
      this.logger.info(`Committed ${kind} evidence ${id}${parentId ? ` (parent ${parentId})` : ""}`);
    }
    return id;
  }

  private admit(evidence: Evidence): void {
    this.records.set(evidence.id, canonicalJson(evidence));
    if (evidence.parent_id !== null) {
      const siblings = this.childIndex.get(evidence.parent_id) ?? [];
      siblings.push(evidence.id);
      this.childIndex.set(evidence.parent_id, siblings);
    }
  }

  private assertLineage(id: string, kind: VersionKind, parentId: string | null): void {
    const context = { stage: "store" as const, evidenceId: id };

    if (parentId === null) {
      if (kind !== "Raw") {
        throw new IntegrityError(`${kind} evidence must name a parent`, context);
      }
      return;
    }
    if (kind === "Raw") {
      throw new IntegrityError(`Raw evidence cannot have a parent (got ${parentId})`, context);
    }

    const parentSerialized = this.records.get(parentId);
    if (!parentSerialized) {
      throw new IntegrityError(`Parent evidence ${parentId} does not exist`, context);
    }
    const parent = this.read(parentId);
    const expected = nextVersionKind(parent.version_kind);
    if (expected !== kind) {
      throw new IntegrityError(
        `${kind} evidence cannot derive from ${parent.version_kind} evidence ${parentId}` +
          (expected ? ` (expected ${expected})` : " (parent is terminal)"),
        context,
      );
    }
  }

  /** Every read re-parses the stored canonical JSON, so callers always get a fresh frozen copy. */
  private read(id: string): Evidence {
    const serialized = this.records.get(id);
    if (serialized === undefined) {
      throw new NotFoundError(`Evidence ${id} not found`, { stage: "store", evidenceId: id });
    }
    const result = parseEvidenceRecord(JSON.parse(serialized));
    if (!result.ok) {
      throw new IntegrityError(`Stored evidence ${id} no longer matches its schema`, {
        stage: "store",
        evidenceId: id,
      });
    }
    return deepFreeze(result.evidence);
  }
}

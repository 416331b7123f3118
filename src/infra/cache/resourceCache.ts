import { ResourceUnavailableError } from "../../domain/errors.js";
import { FaqEntry, ProductEntry, Tokenizer } from "../../domain/types.js";
import { describeError, Logger } from "../../utils/logger.js";
import { AnswerGenerator } from "../ai/types.js";

export const DEFAULT_RESOURCE_TTL_MS = 300_000;

export interface ResourceValues {
  products: ProductEntry[];
  faqs: FaqEntry[];
  tokenizer: Tokenizer;
  answerClient: AnswerGenerator;
}

export type ResourceKind = keyof ResourceValues;

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "products",
  "faqs",
  "tokenizer",
  "answerClient",
];

export type ResourceLoaders = {
  [K in ResourceKind]: () => Promise<ResourceValues[K]>;
};

export interface ResourceCacheOptions {
  ttlMs?: number;
  now?: () => number;
  logger: Logger;
}

export interface ResourceSlotStatus {
  loaded: boolean;
  last_access_at: string | null;
  unavailable: boolean;
}

export type ResourceCacheStatus = Record<ResourceKind, ResourceSlotStatus>;

class CachedResource<T> {
  private value: T | null = null;

  private lastAccessAt: number | null = null;

  private unavailable = false;

  // Bumped by clear(); a load that started under an older generation is not stored.
  private generation = 0;

  private chain: Promise<unknown> = Promise.resolve();

  private pending = 0;

  constructor(
    private readonly kind: ResourceKind,
    private readonly loader: () => Promise<T>,
    private readonly ttlMs: number,
    private readonly now: () => number,
    private readonly logger: Logger,
  ) {}

  get(): Promise<T | null> {
    return this.runExclusive(() => this.readThrough());
  }

  /**
   * Returns the value if it is present and fresh, without waiting. Otherwise
   * starts a load in the background (unless one is already queued) and
   * returns null.
   */
  peek(): T | null {
    if (this.unavailable) {
      return null;
    }

    const now = this.now();
    if (this.value !== null && this.lastAccessAt !== null && now - this.lastAccessAt <= this.ttlMs) {
      this.lastAccessAt = now;
      return this.value;
    }

    if (this.pending === 0) {
      this.get().catch((error: unknown) => {
        this.logger.error("Background load failed", {
          kind: this.kind,
          reason: describeError(error),
        });
      });
    }
    return null;
  }

  /** The stored value, without touching the access time or loading. */
  current(): T | null {
    return this.value;
  }

  clear(): boolean {
    const hadValue = this.value !== null;
    this.value = null;
    this.lastAccessAt = null;
    this.generation += 1;
    return hadValue;
  }

  status(): ResourceSlotStatus {
    return {
      loaded: this.value !== null,
      last_access_at:
        this.lastAccessAt === null ? null : new Date(this.lastAccessAt).toISOString(),
      unavailable: this.unavailable,
    };
  }

  private async readThrough(): Promise<T | null> {
    if (this.unavailable) {
      return null;
    }

    const startedAt = this.now();
    if (
      this.value !== null &&
      this.lastAccessAt !== null &&
      startedAt - this.lastAccessAt > this.ttlMs
    ) {
      this.clear();
      this.logger.info("Evicted stale resource", { kind: this.kind });
    }

    if (this.value !== null) {
      this.lastAccessAt = startedAt;
      return this.value;
    }

    const generation = this.generation;
    let loaded: T;
    try {
      loaded = await this.loader();
    } catch (error) {
      if (error instanceof ResourceUnavailableError) {
        this.unavailable = true;
        this.logger.warn("Resource permanently unavailable", {
          kind: this.kind,
          reason: error.message,
        });
      } else {
        this.logger.error("Resource load failed", {
          kind: this.kind,
          reason: describeError(error),
        });
      }
      return null;
    }

    if (generation !== this.generation) {
      this.logger.debug("Discarding resource loaded across a release", { kind: this.kind });
      return loaded;
    }

    this.value = loaded;
    this.lastAccessAt = this.now();
    this.logger.debug("Loaded resource", { kind: this.kind });
    return loaded;
  }

  private runExclusive<R>(task: () => Promise<R>): Promise<R> {
    this.pending += 1;
    const run = this.chain.then(task, task).finally(() => {
      this.pending -= 1;
    });
    this.chain = run.catch(() => undefined);
    return run;
  }
}

type Slots = { [K in ResourceKind]: CachedResource<ResourceValues[K]> };

/**
 * Owns the lazily loaded corpora, tokenizer and answer client. Values expire
 * after `ttlMs` without access and can be dropped all at once with `releaseAll`.
 */
export class ResourceCache {
  private readonly slots: Slots;

  private readonly logger: Logger;

  constructor(loaders: ResourceLoaders, options: ResourceCacheOptions) {
    const ttlMs = options.ttlMs ?? DEFAULT_RESOURCE_TTL_MS;
    const now = options.now ?? Date.now;
    this.logger = options.logger;
    this.slots = {
      products: new CachedResource("products", loaders.products, ttlMs, now, this.logger),
      faqs: new CachedResource("faqs", loaders.faqs, ttlMs, now, this.logger),
      tokenizer: new CachedResource("tokenizer", loaders.tokenizer, ttlMs, now, this.logger),
      answerClient: new CachedResource(
        "answerClient",
        loaders.answerClient,
        ttlMs,
        now,
        this.logger,
      ),
    };
  }

  get<K extends ResourceKind>(kind: K): Promise<ResourceValues[K] | null> {
    const slot: CachedResource<ResourceValues[K]> = this.slots[kind];
    return slot.get();
  }

  /** Non-blocking read; see `CachedResource.peek`. */
  peek<K extends ResourceKind>(kind: K): ResourceValues[K] | null {
    const slot: CachedResource<ResourceValues[K]> = this.slots[kind];
    return slot.peek();
  }

  /** Drops every cached value regardless of age. Returns the kinds that held one. */
  releaseAll(): ResourceKind[] {
    const released = RESOURCE_KINDS.filter((kind) => this.slots[kind].clear());
    this.logger.info("Released cached resources", { released });
    return released;
  }

  async warmUp(): Promise<void> {
    await Promise.all(RESOURCE_KINDS.map((kind) => this.get(kind)));
  }

  /** Entry counts of the cached corpora; 0 when not loaded. */
  corpusSizes(): { products: number; faqs: number } {
    return {
      products: this.slots.products.current()?.length ?? 0,
      faqs: this.slots.faqs.current()?.length ?? 0,
    };
  }

  describe(): ResourceCacheStatus {
    return {
      products: this.slots.products.status(),
      faqs: this.slots.faqs.status(),
      tokenizer: this.slots.tokenizer.status(),
      answerClient: this.slots.answerClient.status(),
    };
  }
}

import { resolveDimmerConfig, toOpacity, type DimmerConfigOverrides } from './config.js';
import {
  NO_PLACEHOLDER_TEMPLATE,
  type IdentityResolver,
} from './identity-resolver.js';
import { attempt } from './lookup-result.js';
import {
  forEachChild,
  isBankPlaceholder,
  type HostSession,
  type SceneGraphAccessor,
  type SceneNode,
} from './scene-graph.js';
import { TradableCache } from './tradable-cache.js';
import { FRAME_COUNTER_GROUP, telemetry } from './telemetry.js';
import type { UnlockOracle } from './unlock-oracle.js';

export interface DimmingEngineOptions {
  readonly scene: SceneGraphAccessor;
  readonly session: HostSession;
  readonly identity: IdentityResolver;
  /**
   * Absent when unlock data cannot be consulted; every item then counts as
   * unlocked.
   */
  readonly unlocks?: UnlockOracle | null;
  readonly config?: DimmerConfigOverrides;
  /** Share one cache between engines that resolve against the same metadata. */
  readonly tradableCache?: TradableCache;
}

export type DimmerFrameStats = {
  readonly nodesVisited: number;
  readonly itemNodes: number;
  readonly placeholderSlots: number;
  readonly verdictsComputed: number;
  readonly verdictCacheHits: number;
  readonly opacityWrites: number;
  readonly resolutionFailures: number;
  readonly oracleFailures: number;
  readonly nodeFailures: number;
};

type MutableFrameStats = {
  -readonly [TKey in keyof DimmerFrameStats]: DimmerFrameStats[TKey];
};

function createFrameStats(): MutableFrameStats {
  return {
    nodesVisited: 0,
    itemNodes: 0,
    placeholderSlots: 0,
    verdictsComputed: 0,
    verdictCacheHits: 0,
    opacityWrites: 0,
    resolutionFailures: 0,
    oracleFailures: 0,
    nodeFailures: 0,
  };
}

interface NodeView {
  readonly hidden: boolean;
  readonly itemId: number;
  readonly itemQuantity: number;
  readonly opacity: number;
}

function readNode(node: SceneNode): NodeView {
  return {
    hidden: node.hidden,
    itemId: node.itemId,
    itemQuantity: node.itemQuantity,
    opacity: node.opacity,
  };
}

/**
 * Dims icons of tradable items that are not unlocked yet.
 *
 * Subscribed to the host's before-render signal so nothing else in the frame
 * can overwrite the opacity it sets. Every collaborator failure falls back to
 * leaving the icon undimmed; no error escapes {@link DimmingEngine.onFrame}.
 */
export class DimmingEngine {
  private readonly scene: SceneGraphAccessor;
  private readonly session: HostSession;
  private readonly identity: IdentityResolver;
  private readonly unlocks: UnlockOracle | null;
  private readonly tradable: TradableCache;
  // Raw item id -> verdict, valid for the current frame only.
  private readonly decisions = new Map<number, boolean>();
  private lastFrameVerdicts: ReadonlyMap<number, boolean> = new Map();
  private inFrame = false;
  private enabled: boolean;
  private dimOpacity: number;
  private frame: MutableFrameStats = createFrameStats();
  private lastFrameStats: DimmerFrameStats = Object.freeze(createFrameStats());

  constructor(options: DimmingEngineOptions) {
    if (!options.scene) {
      throw new Error('DimmingEngine requires a scene graph accessor.');
    }
    if (!options.session) {
      throw new Error('DimmingEngine requires a host session.');
    }
    if (!options.identity) {
      throw new Error('DimmingEngine requires an identity resolver.');
    }

    const config = resolveDimmerConfig(options.config);
    this.scene = options.scene;
    this.session = options.session;
    this.identity = options.identity;
    this.unlocks = options.unlocks ?? null;
    this.tradable = options.tradableCache ?? new TradableCache();
    this.enabled = config.enabled;
    this.dimOpacity = config.dimOpacity;
  }

  setEnabled(enabled: boolean): void {
    const next = Boolean(enabled);
    if (next === this.enabled) {
      return;
    }
    this.enabled = next;
    telemetry.recordProgress('DimmerEnabledChanged', { enabled: next });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Non-finite values are ignored; everything else is clamped to [0, 255]. */
  setDimOpacity(opacity: number): void {
    this.dimOpacity = toOpacity(opacity) ?? this.dimOpacity;
  }

  getDimOpacity(): number {
    return this.dimOpacity;
  }

  get tradableCacheSize(): number {
    return this.tradable.size;
  }

  /** Counters of the last frame that ran; skipped frames leave them as they were. */
  getLastFrameStats(): DimmerFrameStats {
    return this.lastFrameStats;
  }

  /** The verdict memoized for `rawItemId` by the last frame that ran. */
  getCachedVerdict(rawItemId: number): boolean | undefined {
    return this.lastFrameVerdicts.get(rawItemId);
  }

  onFrame(): void {
    if (!this.enabled) {
      return;
    }
    const active = attempt(() => this.session.isActive());
    if (!active.ok || !active.value) {
      return;
    }

    this.decisions.clear();
    this.frame = createFrameStats();
    this.inFrame = true;
    try {
      const roots = attempt(() => this.scene.getRoots());
      if (!roots.ok) {
        this.frame.nodeFailures += 1;
      } else if (roots.value) {
        for (const root of roots.value) {
          if (root) {
            this.visit(root);
          }
        }
      }
    } finally {
      this.inFrame = false;
      this.lastFrameVerdicts = new Map(this.decisions);
      this.decisions.clear();
    }

    this.completeFrame();
  }

  /**
   * Verdicts are memoized only while a frame is being traversed; outside one
   * every call resolves against the collaborators' current state.
   */
  shouldDim(rawItemId: number): boolean {
    if (!this.inFrame) {
      return this.computeVerdict(rawItemId);
    }

    const cached = this.decisions.get(rawItemId);
    if (cached !== undefined) {
      this.frame.verdictCacheHits += 1;
      return cached;
    }

    const verdict = this.computeVerdict(rawItemId);
    this.decisions.set(rawItemId, verdict);
    this.frame.verdictsComputed += 1;
    return verdict;
  }

  isUnlocked(rawItemId: number, canonicalItemId: number): boolean {
    const oracle = this.unlocks;
    if (!oracle) {
      return true;
    }

    const result = attempt(() =>
      this.resolveUnlock(oracle, rawItemId, canonicalItemId),
    );
    if (!result.ok) {
      this.frame.oracleFailures += 1;
      return true;
    }
    return result.value;
  }

  /**
   * Adds the ids that share unlock status with `itemId`: the item a
   * placeholder stands in for, and the other half of a noted pair.
   */
  collectRelatedIds(itemId: number, sink: Set<number>): void {
    if (itemId <= 0) {
      return;
    }

    const result = attempt(() => this.identity.getComposition(itemId));
    if (!result.ok) {
      this.frame.resolutionFailures += 1;
      return;
    }
    const composition = result.value;
    if (!composition) {
      return;
    }

    if (composition.placeholderTemplateId !== NO_PLACEHOLDER_TEMPLATE) {
      sink.add(composition.placeholderId);
    }

    const linkedNoteId = composition.linkedNoteId;
    if (linkedNoteId > 0 && linkedNoteId !== itemId) {
      sink.add(linkedNoteId);
    }
  }

  private visit(node: SceneNode): void {
    const read = attempt(() => readNode(node));
    if (!read.ok) {
      this.frame.nodeFailures += 1;
      return;
    }
    this.frame.nodesVisited += 1;

    const view = read.value;
    if (view.hidden) {
      return;
    }

    if (view.itemId > 0) {
      this.applyOpacity(node, view);
    }

    const children = attempt(() =>
      forEachChild(node, (child) => this.visit(child)),
    );
    if (!children.ok) {
      this.frame.nodeFailures += 1;
    }
  }

  private applyOpacity(node: SceneNode, view: NodeView): void {
    this.frame.itemNodes += 1;
    const dim = this.shouldDim(view.itemId);

    if (isBankPlaceholder(view.itemId, view.itemQuantity)) {
      this.frame.placeholderSlots += 1;
      return;
    }

    const target = dim ? this.dimOpacity : 0;
    if (view.opacity === target) {
      return;
    }

    const written = attempt(() => {
      node.opacity = target;
    });
    if (written.ok) {
      this.frame.opacityWrites += 1;
    } else {
      this.frame.nodeFailures += 1;
    }
  }

  private computeVerdict(rawItemId: number): boolean {
    const canonicalItemId = this.canonicalize(rawItemId);
    if (canonicalItemId <= 0) {
      return false;
    }
    if (!this.isTradableCanonical(canonicalItemId)) {
      return false;
    }
    return !this.isUnlocked(rawItemId, canonicalItemId);
  }

  private canonicalize(rawItemId: number): number {
    const result = attempt(() => this.identity.canonicalize(rawItemId));
    if (result.ok && Number.isFinite(result.value)) {
      return result.value;
    }
    this.frame.resolutionFailures += 1;
    return rawItemId;
  }

  private isTradableCanonical(canonicalItemId: number): boolean {
    const cached = this.tradable.get(canonicalItemId);
    if (cached !== undefined) {
      return cached;
    }

    const result = attempt(() => this.identity.getComposition(canonicalItemId));
    if (!result.ok) {
      // Not cached: a later frame may resolve it.
      this.frame.resolutionFailures += 1;
      return false;
    }
    return this.tradable.remember(canonicalItemId, result.value?.tradable === true);
  }

  private resolveUnlock(
    oracle: UnlockOracle,
    rawItemId: number,
    canonicalItemId: number,
  ): boolean {
    if (rawItemId > 0 && oracle.isUnlocked(rawItemId)) {
      return true;
    }
    if (
      canonicalItemId > 0 &&
      canonicalItemId !== rawItemId &&
      oracle.isUnlocked(canonicalItemId)
    ) {
      return true;
    }

    const candidates = new Set<number>([rawItemId, canonicalItemId]);
    this.collectRelatedIds(rawItemId, candidates);
    if (canonicalItemId !== rawItemId) {
      this.collectRelatedIds(canonicalItemId, candidates);
    }

    for (const candidate of candidates) {
      if (candidate > 0 && oracle.isUnlocked(candidate)) {
        return true;
      }
    }
    return false;
  }

  private completeFrame(): void {
    const stats: DimmerFrameStats = Object.freeze({ ...this.frame });
    this.lastFrameStats = stats;

    telemetry.recordFrame();
    telemetry.recordCounters(FRAME_COUNTER_GROUP, stats);

    const failures =
      stats.resolutionFailures + stats.oracleFailures + stats.nodeFailures;
    if (failures > 0) {
      telemetry.recordWarning('DimmerLookupFailed', {
        resolutionFailures: stats.resolutionFailures,
        oracleFailures: stats.oracleFailures,
        nodeFailures: stats.nodeFailures,
      });
    }
  }
}

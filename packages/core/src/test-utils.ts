import type { IdentityResolver, ItemComposition } from './identity-resolver.js';
import { NO_PLACEHOLDER_TEMPLATE } from './identity-resolver.js';
import type { HostSession, SceneGraphAccessor, SceneNode, SceneNodeList } from './scene-graph.js';
import type { UnlockOracle } from './unlock-oracle.js';

export interface SceneNodeInit {
  readonly hidden?: boolean;
  readonly itemId?: number;
  readonly itemQuantity?: number;
  readonly opacity?: number;
  readonly dynamicChildren?: SceneNodeList;
  readonly staticChildren?: SceneNodeList;
  readonly nestedChildren?: SceneNodeList;
}

export interface TestSceneNode extends SceneNode {
  /** Every value assigned to `opacity`, in order. */
  readonly opacityWrites: readonly number[];
}

/**
 * Creates a scene node that records opacity writes. Defaults to a visible
 * node with no item and quantity 1.
 */
export function createSceneNode(init: SceneNodeInit = {}): TestSceneNode {
  let opacity = init.opacity ?? 0;
  const writes: number[] = [];

  return {
    hidden: init.hidden ?? false,
    itemId: init.itemId ?? -1,
    itemQuantity: init.itemQuantity ?? 1,
    get opacity() {
      return opacity;
    },
    set opacity(value: number) {
      writes.push(value);
      opacity = value;
    },
    dynamicChildren: init.dynamicChildren,
    staticChildren: init.staticChildren,
    nestedChildren: init.nestedChildren,
    opacityWrites: writes,
  };
}

export interface MutableScene extends SceneGraphAccessor {
  roots: SceneNodeList | undefined;
}

export function createScene(roots: SceneNodeList | undefined): MutableScene {
  return {
    roots,
    getRoots() {
      return this.roots;
    },
  };
}

export interface MutableSession extends HostSession {
  active: boolean;
}

export function createSession(active = true): MutableSession {
  return {
    active,
    isActive() {
      return this.active;
    },
  };
}

export interface FakeItem {
  readonly canonicalId?: number;
  readonly tradable?: boolean;
  readonly placeholderTemplateId?: number;
  readonly placeholderId?: number;
  readonly linkedNoteId?: number;
}

export interface FakeIdentityResolverOptions {
  readonly failCanonicalize?: readonly number[];
  readonly failComposition?: readonly number[];
}

export interface FakeIdentityResolver extends IdentityResolver {
  readonly canonicalizeCalls: readonly number[];
  readonly compositionCalls: readonly number[];
}

/**
 * Identity resolver over a fixed table. Ids missing from the table
 * canonicalize to themselves and have no composition.
 */
export function createFakeIdentityResolver(
  items: Readonly<Record<number, FakeItem>>,
  options: FakeIdentityResolverOptions = {},
): FakeIdentityResolver {
  const table = new Map(
    Object.entries(items).map(([key, item]) => [Number(key), item] as const),
  );
  const failCanonicalize = new Set(options.failCanonicalize ?? []);
  const failComposition = new Set(options.failComposition ?? []);
  const canonicalizeCalls: number[] = [];
  const compositionCalls: number[] = [];

  return {
    canonicalizeCalls,
    compositionCalls,
    canonicalize(rawItemId) {
      canonicalizeCalls.push(rawItemId);
      if (failCanonicalize.has(rawItemId)) {
        throw new Error(`canonicalize failed for ${rawItemId}`);
      }
      return table.get(rawItemId)?.canonicalId ?? rawItemId;
    },
    getComposition(itemId): ItemComposition | undefined {
      compositionCalls.push(itemId);
      if (failComposition.has(itemId)) {
        throw new Error(`composition lookup failed for ${itemId}`);
      }
      const item = table.get(itemId);
      if (!item) {
        return undefined;
      }
      return {
        tradable: item.tradable ?? false,
        placeholderTemplateId: item.placeholderTemplateId ?? NO_PLACEHOLDER_TEMPLATE,
        placeholderId: item.placeholderId ?? -1,
        linkedNoteId: item.linkedNoteId ?? -1,
      };
    },
  };
}

export interface RecordingOracle extends UnlockOracle {
  readonly queries: readonly number[];
}

export function createRecordingOracle(
  unlocked: Iterable<number>,
  options: { readonly failOn?: readonly number[] } = {},
): RecordingOracle {
  const ids = new Set(unlocked);
  const failOn = new Set(options.failOn ?? []);
  const queries: number[] = [];

  return {
    queries,
    isUnlocked(itemId) {
      queries.push(itemId);
      if (failOn.has(itemId)) {
        throw new Error(`unlock store unavailable for ${itemId}`);
      }
      return ids.has(itemId);
    },
  };
}

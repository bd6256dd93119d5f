/**
 * A renderable interface element owned by the host. The dimmer reads the
 * item binding and writes `opacity`; everything else belongs to the host.
 */
export interface SceneNode {
  readonly hidden: boolean;
  /** Bound item id; values `<= 0` mean no item is bound. */
  readonly itemId: number;
  readonly itemQuantity: number;
  /** 0 (opaque) to 255 (fully transparent). */
  opacity: number;
  readonly dynamicChildren?: SceneNodeList;
  readonly staticChildren?: SceneNodeList;
  readonly nestedChildren?: SceneNodeList;
}

export type SceneNodeList = ReadonlyArray<SceneNode | null | undefined> | null;

export const CHILD_PARTITIONS = [
  'dynamicChildren',
  'staticChildren',
  'nestedChildren',
] as const;

export type ChildPartition = (typeof CHILD_PARTITIONS)[number];

export interface SceneGraphAccessor {
  /** Root nodes for the current frame, or nothing while the host has none. */
  getRoots(): SceneNodeList | undefined;
}

export interface HostSession {
  /** Whether the host is in a state where interface mutation is meaningful. */
  isActive(): boolean;
}

/**
 * Bank placeholder slots keep their item id at zero quantity; the host dims
 * them itself.
 */
export function isBankPlaceholder(itemId: number, itemQuantity: number): boolean {
  return itemId > 0 && itemQuantity === 0;
}

/**
 * Calls `visitor` for every present child in every partition of `node`.
 * Absent partitions and empty slots are skipped.
 */
export function forEachChild(
  node: SceneNode,
  visitor: (child: SceneNode, partition: ChildPartition) => void,
): void {
  for (const partition of CHILD_PARTITIONS) {
    const children = node[partition];
    if (!children) {
      continue;
    }
    for (const child of children) {
      if (child) {
        visitor(child, partition);
      }
    }
  }
}

import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { DimmingEngine } from './dimming-engine.js';
import {
  createFakeIdentityResolver,
  createRecordingOracle,
  createScene,
  createSceneNode,
  createSession,
  type FakeItem,
  type TestSceneNode,
} from './test-utils.js';

// Keep runs modest to avoid slowing the suite; seed is deterministic.
const propertyConfig: fc.Parameters<unknown> = { numRuns: 100, seed: 240611 };

const ITEM_IDS: readonly number[] = [1, 2, 3, 4, 5, 6];
const DIM_OPACITY = 150;

interface NodeSpec {
  readonly hidden: boolean;
  readonly itemId: number;
  readonly itemQuantity: number;
  readonly opacity: number;
  readonly dynamicChildren: (NodeSpec | null)[] | undefined;
  readonly staticChildren: (NodeSpec | null)[] | undefined;
  readonly nestedChildren: (NodeSpec | null)[] | undefined;
}

interface BuiltNode {
  readonly node: TestSceneNode;
  readonly spec: NodeSpec;
  readonly reachable: boolean;
}

function nodeSpecArbitrary(depth: number): fc.Arbitrary<NodeSpec> {
  const children: fc.Arbitrary<(NodeSpec | null)[] | undefined> =
    depth <= 0
      ? fc.constant(undefined)
      : fc.option(
          fc.array(fc.option(nodeSpecArbitrary(depth - 1), { nil: null }), {
            maxLength: 2,
          }),
          { nil: undefined },
        );

  return fc.record({
    hidden: fc.boolean(),
    itemId: fc.integer({ min: -1, max: 6 }),
    itemQuantity: fc.integer({ min: 0, max: 3 }),
    opacity: fc.constantFrom(0, 90, DIM_OPACITY),
    dynamicChildren: children,
    staticChildren: children,
    nestedChildren: children,
  });
}

function buildTree(spec: NodeSpec, reachable: boolean, sink: BuiltNode[]): TestSceneNode {
  const childrenReachable = reachable && !spec.hidden;
  const build = (list: (NodeSpec | null)[] | undefined) =>
    list?.map((child) => (child ? buildTree(child, childrenReachable, sink) : null));

  const node = createSceneNode({
    hidden: spec.hidden,
    itemId: spec.itemId,
    itemQuantity: spec.itemQuantity,
    opacity: spec.opacity,
    dynamicChildren: build(spec.dynamicChildren),
    staticChildren: build(spec.staticChildren),
    nestedChildren: build(spec.nestedChildren),
  });
  sink.push({ node, spec, reachable });
  return node;
}

function createWorld(
  roots: readonly NodeSpec[],
  tradable: readonly number[],
  unlocked: readonly number[] | null,
) {
  const built: BuiltNode[] = [];
  const rootNodes = roots.map((root) => buildTree(root, true, built));
  const items: Record<number, FakeItem> = {};
  for (const id of ITEM_IDS) {
    items[id] = { tradable: tradable.includes(id) };
  }

  const engine = new DimmingEngine({
    scene: createScene(rootNodes),
    session: createSession(),
    identity: createFakeIdentityResolver(items),
    unlocks: unlocked === null ? null : createRecordingOracle(unlocked),
    config: { dimOpacity: DIM_OPACITY },
  });

  return { engine, built };
}

const forestArbitrary = fc.array(nodeSpecArbitrary(3), { maxLength: 3 });
const idSubsetArbitrary = fc.subarray([...ITEM_IDS]);

describe('property: dimming engine', () => {
  it('sets every visible item icon to its verdict and never touches the rest', () => {
    fc.assert(
      fc.property(forestArbitrary, idSubsetArbitrary, idSubsetArbitrary, (roots, tradable, unlocked) => {
        const { engine, built } = createWorld(roots, tradable, unlocked);

        engine.onFrame();

        for (const { node, spec, reachable } of built) {
          const applies =
            reachable && !spec.hidden && spec.itemId > 0 && spec.itemQuantity > 0;
          if (!applies) {
            expect(node.opacityWrites).toEqual([]);
            continue;
          }
          const dim = tradable.includes(spec.itemId) && !unlocked.includes(spec.itemId);
          expect(node.opacity).toBe(dim ? DIM_OPACITY : 0);
          expect(node.opacityWrites.length).toBe(spec.opacity === node.opacity ? 0 : 1);
        }
      }),
      propertyConfig,
    );
  });

  it('writes nothing on a repeated frame with unchanged state', () => {
    fc.assert(
      fc.property(forestArbitrary, idSubsetArbitrary, idSubsetArbitrary, (roots, tradable, unlocked) => {
        const { engine, built } = createWorld(roots, tradable, unlocked);

        engine.onFrame();
        const writesAfterFirst = built.map(({ node }) => node.opacityWrites.length);
        engine.onFrame();

        expect(built.map(({ node }) => node.opacityWrites.length)).toEqual(writesAfterFirst);
        expect(engine.getLastFrameStats().opacityWrites).toBe(0);
      }),
      propertyConfig,
    );
  });

  it('never dims anything without an unlock oracle', () => {
    fc.assert(
      fc.property(forestArbitrary, idSubsetArbitrary, (roots, tradable) => {
        const { engine, built } = createWorld(roots, tradable, null);

        engine.onFrame();

        for (const { node } of built) {
          expect(node.opacityWrites.every((value) => value === 0)).toBe(true);
        }
        for (const id of ITEM_IDS) {
          expect(engine.shouldDim(id)).toBe(false);
        }
      }),
      propertyConfig,
    );
  });
});

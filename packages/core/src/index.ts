export {
  DEFAULT_DIMMER_CONFIG,
  clampOpacity,
  resolveDimmerConfig,
  toOpacity,
  type DimmerConfig,
  type DimmerConfigOverrides,
} from './config.js';

export {
  DimmingEngine,
  type DimmerFrameStats,
  type DimmingEngineOptions,
} from './dimming-engine.js';

export {
  NO_PLACEHOLDER_TEMPLATE,
  type IdentityResolver,
  type ItemComposition,
} from './identity-resolver.js';

export {
  UnknownItemError,
  createCatalogIdentityResolver,
} from './catalog-identity-resolver.js';

export {
  createUnlockedItemSet,
  type UnlockOracle,
  type UnlockedItemSet,
} from './unlock-oracle.js';

export { TradableCache } from './tradable-cache.js';

export {
  CHILD_PARTITIONS,
  forEachChild,
  isBankPlaceholder,
  type ChildPartition,
  type HostSession,
  type SceneGraphAccessor,
  type SceneNode,
  type SceneNodeList,
} from './scene-graph.js';

export {
  DIMMING_ENGINE_LABEL,
  attachDimmingEngine,
  createFrameLifecycle,
  type FrameHandler,
  type FrameLifecycle,
  type FrameLifecycleController,
  type FrameSubscription,
  type FrameSubscriptionOptions,
} from './frame-lifecycle.js';

export { attempt, type LookupResult } from './lookup-result.js';

export {
  FRAME_COUNTER_GROUP,
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';

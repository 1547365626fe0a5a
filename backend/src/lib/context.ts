import { config, getDedupSettingsWithEnvOverrides, type DedupSettings } from './config.js';
import { KeyedLock } from './locks.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { DynamoReviewStore, DynamoStoryIndex } from './stores/dynamo.js';
import type { ReviewStore, StoryIndex } from './stores/types.js';

// Everything a dedup operation reads or writes, passed explicitly
export interface DedupContext {
  stories: StoryIndex;
  reviews: ReviewStore;
  // Shared by every import in the process; keyed by canonical URL or review id
  locks: KeyedLock;
  settings: DedupSettings;
  logger: Logger;
  now: () => Date;
}

const processLocks = new KeyedLock();

export function createDedupContext(overrides: Partial<DedupContext> = {}): DedupContext {
  return {
    stories: overrides.stories ?? new DynamoStoryIndex(config.tables.stories),
    reviews: overrides.reviews ?? new DynamoReviewStore(config.tables.reviews),
    locks: overrides.locks ?? processLocks,
    settings: overrides.settings ?? getDedupSettingsWithEnvOverrides(),
    logger: overrides.logger ?? rootLogger,
    now: overrides.now ?? (() => new Date()),
  };
}

// Tag types

import type { Id, Timestamp } from './common.js';

/**
 * A Tag is a unique, case-insensitive text label.
 * Tags are created implicitly the first time an issue references them.
 */
export type Tag = {
  'tag-id': Id;
  tag: string;
  'create-date': Timestamp;
};

/**
 * NotifyRef resolution: target lookup plus shallow override merge
 */

import type { NotifyRef, NotifyTarget } from '../config/types';
import { parseTargetConfig } from '../notifiers/schemas';
import type { ResolvedTarget } from '../notifiers/types';

/**
 * Merge `ref.overrides` over the target's base config (fields present in the
 * override replace, absent ones are inherited) and validate the result for
 * the target's channel.
 * @throws ConfigError
 */
export function resolveNotifyRef(
  target: NotifyTarget,
  ref: NotifyRef
): ResolvedTarget {
  return parseTargetConfig(target.channel, {
    ...target.config,
    ...ref.overrides,
  });
}

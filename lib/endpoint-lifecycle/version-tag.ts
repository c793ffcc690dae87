// lib/endpoint-lifecycle/version-tag.ts
import { Clock, systemClock } from '../utils/clock';

/** SageMaker resource names: at most 63 characters of [a-zA-Z0-9-]. */
export const MAX_RESOURCE_NAME_LENGTH = 63;

/**
 * Issues `YYYYMMDDHHmmss-<seq>` tags that never repeat within a process, even
 * when the clock does not advance (or steps backwards) between calls.
 */
export class VersionTagGenerator {
  private lastStamp = '';
  private sequence = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  public next(): string {
    const stamp = formatTimestamp(this.clock.now());
    if (stamp <= this.lastStamp) {
      this.sequence += 1;
    } else {
      this.lastStamp = stamp;
      this.sequence = 0;
    }
    return `${this.lastStamp}-${this.sequence}`;
  }
}

/** UTC `YYYYMMDDHHmmss`. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * `<base>-<tag>`, with the base cut down so the whole name fits the platform limit.
 */
export function buildVersionedName(base: string, tag: string): string {
  const room = MAX_RESOURCE_NAME_LENGTH - tag.length - 1;
  const sanitized = base.replace(/[^a-zA-Z0-9-]/g, '-');
  const trimmed = sanitized.slice(0, Math.max(0, room)).replace(/-+$/, '');
  return trimmed ? `${trimmed}-${tag}` : tag;
}

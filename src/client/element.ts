/**
 * Element - a named, optionally emoji-tagged pairing result.
 *
 * Equality is by name only. The element with every field absent is the
 * "empty" element and stands for a pairing that produced nothing.
 */

import type { DiscoveryRecord } from '../shared/types';

export class Element {
  constructor(
    readonly name: string | null = null,
    readonly emoji: string | null = null,
    readonly isFirstDiscovery: boolean | null = null
  ) {}

  /**
   * True when name, emoji and isFirstDiscovery are all absent
   */
  isEmpty(): boolean {
    return this.name === null && this.emoji === null && this.isFirstDiscovery === null;
  }

  /**
   * Same name. Two empty elements are equal.
   */
  equals(other: Element | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return other.name === this.name;
  }

  toString(): string {
    const name = this.name ?? '';
    return this.emoji ? `${this.emoji} ${name}` : name;
  }

  toRecord(): DiscoveryRecord {
    return {
      name: this.name,
      emoji: this.emoji,
      isFirstDiscovery: this.isFirstDiscovery,
    };
  }
}

/**
 * Constructor shape used to build elements, so callers can plug in a subclass.
 */
export type ElementClass = new (
  name?: string | null,
  emoji?: string | null,
  isFirstDiscovery?: boolean | null
) => Element;

export function elementFromRecord(record: DiscoveryRecord, cls: ElementClass = Element): Element {
  return new cls(record.name, record.emoji, record.isFirstDiscovery);
}

export function emptyElement(cls: ElementClass = Element): Element {
  return new cls(null, null, null);
}

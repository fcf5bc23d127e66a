/**
 * Navigation Stack
 *
 * Breadcrumb of visited containers, root first and current last. Every key is
 * a strict prefix of the next one, and the stack never becomes empty.
 */

import { isContainerKey, isStrictAncestor } from './container-key.js';
import type { ContainerKey } from './types.js';

interface Slot {
  key: ContainerKey;
  /** Selection to restore when this container becomes current again */
  cursor?: number;
}

export class NavigationStack {
  private slots: Slot[];

  constructor(root: ContainerKey) {
    this.slots = [{ key: root }];
  }

  /**
   * Descend into `key`. Throws RangeError when `key` is not a container key
   * below the current one.
   */
  push(key: ContainerKey): ContainerKey {
    if (!isContainerKey(key)) {
      throw new RangeError(`Cannot descend into ${key}: not a container`);
    }
    const top = this.current();
    if (!isStrictAncestor(top, key)) {
      throw new RangeError(`Cannot descend into ${key} from ${top}`);
    }
    this.slots.push({ key });
    return key;
  }

  /**
   * Remove the current container unless it is the root. Returns the new top.
   */
  pop(): ContainerKey {
    if (this.slots.length > 1) {
      this.slots.pop();
    }
    return this.current();
  }

  current(): ContainerKey {
    return this.top().key;
  }

  /**
   * Drop everything above the root. The root's remembered cursor is kept.
   */
  reset(): ContainerKey {
    this.slots = this.slots.slice(0, 1);
    return this.current();
  }

  get depth(): number {
    return this.slots.length;
  }

  atRoot(): boolean {
    return this.slots.length === 1;
  }

  keys(): ContainerKey[] {
    return this.slots.map((slot) => slot.key);
  }

  getCursor(): number | undefined {
    return this.top().cursor;
  }

  setCursor(cursor: number | undefined): void {
    this.top().cursor = cursor;
  }

  private top(): Slot {
    return this.slots[this.slots.length - 1];
  }
}

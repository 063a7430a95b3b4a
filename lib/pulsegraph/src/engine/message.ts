/**
 * Signal sent from a node to its listeners after one of its lifecycle hooks
 * completed. Both fields are independent.
 */
export class Message {
  /**
   * The sender (or one of the nodes before it) changed
   */
  readonly changed: boolean;

  /**
   * New outputs can no longer be considered a continuation of previous ones
   */
  readonly historyInvalid: boolean;

  constructor(changed = false, historyInvalid = false) {
    this.changed = changed;
    this.historyInvalid = historyInvalid;
    Object.freeze(this);
  }

  toString(): string {
    return `Message(changed=${this.changed}, historyInvalid=${this.historyInvalid})`;
  }
}

/**
 * Everything downstream has to be rebuilt
 */
export const FULL_INVALIDATION = new Message(true, true);

export function createMessage(changed: boolean, historyInvalid: boolean): Message {
  return changed && historyInvalid ? FULL_INVALIDATION : new Message(changed, historyInvalid);
}

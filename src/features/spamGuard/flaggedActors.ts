/**
 * WHAT: Set of actors currently under spam containment.
 * WHY: Stops a second escalation for someone whose first is still in flight or
 *      under review. Membership follows the review record: added before the
 *      first await of an escalation, removed on abort or terminal resolution.
 *      The activity sweep never touches it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { actorKey, type ActorRef } from "./types.js";

export class FlaggedActorSet {
  private readonly members = new Set<string>();

  /**
   * Test-and-set. JS is single threaded, so as long as callers invoke this
   * before their first await there is no window for a second escalation.
   * @returns false when the actor was already flagged
   */
  tryFlag(actor: ActorRef): boolean {
    const key = actorKey(actor);
    if (this.members.has(key)) return false;
    this.members.add(key);
    return true;
  }

  unflag(actor: ActorRef): void {
    this.members.delete(actorKey(actor));
  }

  has(actor: ActorRef): boolean {
    return this.members.has(actorKey(actor));
  }

  size(): number {
    return this.members.size;
  }

  /** Startup: every pending review means a contained actor */
  hydrate(actors: Iterable<ActorRef>): number {
    let added = 0;
    for (const actor of actors) {
      if (this.tryFlag(actor)) added++;
    }
    return added;
  }
}
